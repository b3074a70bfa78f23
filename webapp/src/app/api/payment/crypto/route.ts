import { NextResponse, type NextRequest } from "next/server";
import { CONFIG } from "@core/config";
import { errorResponse, numberField, parseId, readJson, textField } from "@core/http";
import { Orders } from "@core/orders";
import { Profiles } from "@core/profiles";
import { getNotifier, getStore } from "@core/runtime";
import { requireSession } from "~/lib/session";

export async function POST(req: NextRequest) {
  try {
    const user = await requireSession(req);
    const payload = await readJson(req);
    const profileId = parseId(textField(payload, "profile_id"), "profile_id");
    const amount = numberField(payload, "amount") ?? Number.NaN;
    const wallet = textField(payload, "crypto_type").trim().toLowerCase();
    const currency = textField(payload, "currency").trim().toUpperCase() || "USD";

    const { quote, profileName } = await getStore().update((document) => {
      const result = Orders.quote(document, {
        profileId,
        telegramUserId: user.telegramUserId,
        amount,
        wallet,
        currency,
      });
      return { quote: result, profileName: Profiles.get(document, profileId)?.name ?? "" };
    });

    const { order } = quote;
    await getNotifier().notifyOrder(order, profileName, quote.created);
    return NextResponse.json({
      success: true,
      order_id: order.id,
      order_number: order.order_number,
      amount: order.amount,
      bonus_amount: order.bonus_amount,
      total_amount: order.total_amount,
      crypto_type: order.crypto_type,
      currency: order.currency,
      wallet_address: quote.walletAddress,
      expires_in: Math.round(CONFIG.ORDER_TTL_MS / 1000),
    });
  } catch (error) {
    return errorResponse(error, "crypto payment route");
  }
}
