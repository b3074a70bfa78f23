import type { NextRequest } from "next/server";
import { DomainError } from "@core/db";
import { getSessionDirectory } from "@core/runtime";
import type { SessionUser } from "@core/sessions";

export const SESSION_COOKIE = "telegram_session";

/** The caller behind the session cookie; throws UNAUTHORIZED (401) when there is none. */
export async function requireSession(request: NextRequest): Promise<SessionUser> {
  const token = request.cookies.get(SESSION_COOKIE)?.value;
  if (!token) throw new DomainError("UNAUTHORIZED", "Not authenticated");
  const user = await getSessionDirectory().resolve(token);
  if (!user) throw new DomainError("UNAUTHORIZED", "Session expired");
  return user;
}
