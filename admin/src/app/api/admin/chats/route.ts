import { NextResponse } from "next/server";
import { requireAdminAuth } from "@/lib/admin-auth";
import { Chats } from "@core/chats";
import { errorResponse } from "@core/http";
import { getStore } from "@core/runtime";

export async function GET(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const document = await getStore().load();
    const chats = Chats.listForAdmin(document).map((chat) => {
      const last = Chats.lastMessage(document, chat.id);
      return { ...chat, last_message: last?.text ?? "", last_message_time: last?.created_at ?? chat.created_at };
    });
    chats.sort((a, b) => b.last_message_time.localeCompare(a.last_message_time));
    return NextResponse.json({ chats });
  } catch (error) {
    return errorResponse(error, "admin chats route");
  }
}
