import { NextResponse, type NextRequest } from "next/server";
import { Chats } from "@core/chats";
import { errorResponse } from "@core/http";
import { getStore } from "@core/runtime";
import { requireSession } from "~/lib/session";

export async function GET(req: NextRequest) {
  try {
    const user = await requireSession(req);
    const document = await getStore().load();
    return NextResponse.json({ chats: Chats.listForUser(document, user.telegramUserId) });
  } catch (error) {
    return errorResponse(error, "user chats route");
  }
}
