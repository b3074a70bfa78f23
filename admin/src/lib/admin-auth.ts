import { NextResponse } from "next/server";
import { readEnv } from "@core/config";
import { REALM, matchesCredentials } from "@/lib/basic-auth";

function challenge(): NextResponse {
  return NextResponse.json(
    { error: "Authentication required" },
    { status: 401, headers: { "WWW-Authenticate": REALM } },
  );
}

/** Returns the response to send back when the caller is not the operator, else null. */
export function requireAdminAuth(request: Request): NextResponse | null {
  const user = readEnv("ADMIN_USER");
  const pass = readEnv("ADMIN_PASS");

  if (!user || !pass) {
    console.error("❌ ADMIN_USER and ADMIN_PASS must be configured");
    return NextResponse.json(
      { error: "ADMIN_USER and ADMIN_PASS must be configured" },
      { status: 500 },
    );
  }

  if (!matchesCredentials(request.headers.get("authorization"), { user, pass })) {
    return challenge();
  }
  return null;
}
