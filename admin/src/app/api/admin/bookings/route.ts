import { NextResponse } from "next/server";
import { requireAdminAuth } from "@/lib/admin-auth";
import { errorResponse } from "@core/http";
import { Orders } from "@core/orders";
import { getStore } from "@core/runtime";

export async function GET(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const document = await getStore().load();
    return NextResponse.json({ bookings: Orders.listBookings(document) });
  } catch (error) {
    return errorResponse(error, "bookings route");
  }
}
