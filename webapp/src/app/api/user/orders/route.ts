import { NextResponse, type NextRequest } from "next/server";
import { errorResponse } from "@core/http";
import { Orders, type OrderFilter } from "@core/orders";
import { getStore } from "@core/runtime";
import { requireSession } from "~/lib/session";

function statusFilter(raw: string | null): OrderFilter {
  return raw === "unpaid" || raw === "booked" ? raw : "all";
}

export async function GET(req: NextRequest) {
  try {
    const user = await requireSession(req);
    const filter = statusFilter(new URL(req.url).searchParams.get("status"));
    const document = await getStore().load();
    return NextResponse.json({ orders: Orders.listForUser(document, user.telegramUserId, filter) });
  } catch (error) {
    return errorResponse(error, "user orders route");
  }
}
