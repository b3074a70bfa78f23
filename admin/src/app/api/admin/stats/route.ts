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
    return NextResponse.json({
      profiles: document.profiles.length,
      visible_profiles: document.profiles.filter((p) => p.visible).length,
      chats: document.chats.length,
      messages: document.messages.length,
      unread_messages: Chats.totalUnread(document),
      unpaid_orders: document.orders.filter((o) => o.status === "unpaid").length,
      booked_orders: document.orders.filter((o) => o.status === "booked").length,
      comments: document.comments.length,
    });
  } catch (error) {
    return errorResponse(error, "stats route");
  }
}
