import { NextResponse } from "next/server";
import { requireAdminAuth } from "@/lib/admin-auth";
import { Chats } from "@core/chats";
import { DomainError } from "@core/db";
import { errorResponse, parseId, readJson, textField } from "@core/http";
import { getStore } from "@core/runtime";

export async function POST(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const chatId = parseId(textField(await readJson(req), "chatId"), "chatId");
    const marked = await getStore().update((document) => {
      if (!Chats.findById(document, chatId)) throw new DomainError("CHAT_NOT_FOUND", "Chat not found");
      return Chats.markRead(document, chatId);
    });
    return NextResponse.json({ success: true, marked });
  } catch (error) {
    return errorResponse(error, "mark-read route");
  }
}
