import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { NextRequest } from "next/server";
import { DocumentStore } from "../src/db";
import { BOOKING_CONFIRMATION_TEXT } from "../src/chats";
import { FileSessionDirectory } from "../src/sessions";
import { makeProfile, makeTempDir, removeDir } from "./fixtures";

const runtimeMock = vi.hoisted(() => ({
  getStore: vi.fn(),
  getSessionDirectory: vi.fn(),
  notifyMessage: vi.fn(async () => 1),
  notifyOrder: vi.fn(async () => 1),
}));

vi.mock("@core/runtime", () => ({
  getStore: runtimeMock.getStore,
  getSessionDirectory: runtimeMock.getSessionDirectory,
  getNotifier: () => ({
    notifyMessage: runtimeMock.notifyMessage,
    notifyOrder: runtimeMock.notifyOrder,
  }),
}));

import { GET as profilesGET } from "../webapp/src/app/api/profiles/route";
import { GET as profileGET } from "../webapp/src/app/api/profiles/[id]/route";
import { GET as commentsGET, POST as commentsPOST } from "../webapp/src/app/api/profiles/[id]/comments/route";
import { GET as filtersGET } from "../webapp/src/app/api/filters/route";
import { GET as messagesGET, POST as messagesPOST } from "../webapp/src/app/api/chats/[profileId]/messages/route";
import { GET as updatesGET } from "../webapp/src/app/api/chats/[profileId]/updates/route";
import { POST as markReadPOST } from "../webapp/src/app/api/chats/[profileId]/mark_read/route";
import { GET as userChatsGET } from "../webapp/src/app/api/user/chats/route";
import { GET as userOrdersGET } from "../webapp/src/app/api/user/orders/route";
import { DELETE as orderDELETE } from "../webapp/src/app/api/orders/[id]/route";
import { POST as cryptoPOST } from "../webapp/src/app/api/payment/crypto/route";
import { GET as settingsGET } from "../webapp/src/app/api/settings/route";
import { POST as adminReplyPOST } from "../admin/src/app/api/admin/chats/[profileId]/reply/route";

const SESSIONS = {
  "session-u1": { telegram_id: "u1", user_data: { first_name: "Anna", username: "anna" }, expires_at: "2999-01-01T00:00:00.000Z" },
  "session-u2": { telegram_id: "u2", user_data: { first_name: "Boris", username: "boris" }, expires_at: "2999-01-01T00:00:00.000Z" },
  "session-old": { telegram_id: "u3", user_data: { first_name: "Old" }, expires_at: "2020-01-01T00:00:00.000Z" },
};

function userRequest(url: string, method = "GET", body?: unknown, session = "session-u1"): NextRequest {
  const headers: Record<string, string> = { cookie: `theme=dark; telegram_session=${session}` };
  if (body !== undefined) headers["content-type"] = "application/json";
  return new NextRequest(`http://localhost${url}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

function params<T>(value: T): { params: Promise<T> } {
  return { params: Promise.resolve(value) };
}

describe("webapp API", () => {
  let dir = "";
  let store: DocumentStore;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = makeTempDir("webapp-api-");
    store = new DocumentStore({ filePath: path.join(dir, "data.json") });
    runtimeMock.getStore.mockReturnValue(store);

    const sessionsFile = path.join(dir, "sessions.json");
    fs.writeFileSync(sessionsFile, JSON.stringify(SESSIONS));
    runtimeMock.getSessionDirectory.mockReturnValue(new FileSessionDirectory(sessionsFile));

    await store.update((document) => {
      document.profiles.push(
        makeProfile(3, { travel_cities: ["Milan"] }),
        makeProfile(7, { city: "Paris", nationality: "French", age: 31 }),
        makeProfile(9, { visible: false, city: "Berlin" }),
      );
    });
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it("requires a session for user routes", async () => {
    const response = await userChatsGET(new NextRequest("http://localhost/api/user/chats"));
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: "Not authenticated", code: "UNAUTHORIZED" });

    const unknown = await userOrdersGET(userRequest("/api/user/orders", "GET", undefined, "session-gone"));
    expect(unknown.status).toBe(401);
    expect((await unknown.json()).error).toBe("Session expired");

    const expired = await userOrdersGET(userRequest("/api/user/orders", "GET", undefined, "session-old"));
    expect(expired.status).toBe(401);
  });

  it("lists visible profiles with filters and the filter options", async () => {
    const all = await (await profilesGET(new Request("http://localhost/api/profiles"))).json();
    expect(all.profiles.map((p: { id: number }) => p.id)).toEqual([3, 7]);
    expect(all).toMatchObject({ has_more: false, total: 2 });

    const filtered = await (await profilesGET(new Request("http://localhost/api/profiles?city=paris&age_min=30"))).json();
    expect(filtered.profiles.map((p: { id: number }) => p.id)).toEqual([7]);

    const paged = await (await profilesGET(new Request("http://localhost/api/profiles?limit=1&page=0"))).json();
    expect(paged).toMatchObject({ has_more: true, total: 2 });

    const options = await (await filtersGET()).json();
    expect(options).toEqual({
      cities: ["Paris", "Rome"],
      nationalities: ["French", "Italian"],
      travel_cities: ["Milan"],
      genders: ["male", "female", "transgender"],
    });
  });

  it("hides profiles that are not visible", async () => {
    const hidden = await profileGET(new Request("http://localhost/api/profiles/9"), params({ id: "9" }));
    expect(hidden.status).toBe(404);

    const shown = await (await profileGET(new Request("http://localhost/api/profiles/3"), params({ id: "3" }))).json();
    expect(shown).toMatchObject({ id: 3, name: "Profile 3", comments: [] });
  });

  it("exposes the public settings", async () => {
    const settings = await (await settingsGET()).json();
    expect(settings).toEqual({
      crypto_wallets: { trc20: "TTestTrc20Address", btc: "bc1-test-btc-address" },
      banner: { text: "", link: "", link_text: "", visible: false },
      bonus_percentage: 5,
    });
  });

  it("runs a booking from quote to review", async () => {
    const quoted = await cryptoPOST(userRequest("/api/payment/crypto", "POST", {
      profile_id: 3,
      amount: 50,
      crypto_type: "TRC20",
    }));
    expect(quoted.status).toBe(200);
    const quote = await quoted.json();
    expect(quote).toMatchObject({
      success: true,
      amount: 50,
      bonus_amount: 2.5,
      total_amount: 52.5,
      crypto_type: "trc20",
      currency: "USD",
      wallet_address: "TTestTrc20Address",
      expires_in: 3600,
    });
    expect(quote.order_number).toMatch(/^[A-Za-z0-9]{18}$/);
    expect(runtimeMock.notifyOrder).toHaveBeenCalledWith(
      expect.objectContaining({ id: quote.order_id, status: "unpaid" }),
      "Profile 3",
      true,
    );

    const early = await commentsPOST(userRequest("/api/profiles/3/comments", "POST", { text: "Lovely" }), params({ id: "3" }));
    expect(early.status).toBe(403);

    const adminReply = await adminReplyPOST(
      new Request("http://localhost/api/admin/chats/3/reply", {
        method: "POST",
        headers: {
          authorization: `Basic ${Buffer.from("admin:test-secret").toString("base64")}`,
          "content-type": "application/json",
        },
        body: JSON.stringify({ text: "payment successful", telegramUserId: "u1" }),
      }),
      params({ profileId: "3" }),
    );
    expect((await adminReply.json()).booked_order).toMatchObject({ id: quote.order_id, status: "booked" });

    const orders = await (await userOrdersGET(userRequest("/api/user/orders?status=booked"))).json();
    expect(orders.orders).toHaveLength(1);
    expect(orders.orders[0]).toMatchObject({ id: quote.order_id, amount: 52.5, status: "booked", profile_name: "Profile 3" });

    const history = await (await messagesGET(userRequest("/api/chats/3/messages"), params({ profileId: "3" }))).json();
    expect(history.messages.map((m: { sender: string; text: string }) => [m.sender, m.text])).toEqual([
      ["admin", "payment successful"],
      ["system", BOOKING_CONFIRMATION_TEXT],
    ]);

    const review = await commentsPOST(
      userRequest("/api/profiles/3/comments", "POST", { text: "Lovely", promo_code: "summer10" }),
      params({ id: "3" }),
    );
    expect(review.status).toBe(201);
    expect((await review.json()).comment).toMatchObject({
      user_name: "Anna",
      telegram_username: "anna",
      telegram_user_id: "u1",
      promo_code: "SUMMER10",
      text: "Lovely",
    });

    const comments = await (await commentsGET(new Request("http://localhost/api/profiles/3/comments"), params({ id: "3" }))).json();
    expect(comments.comments).toHaveLength(1);
  });

  it("rejects quotes for unknown wallets and bad amounts", async () => {
    const wallet = await cryptoPOST(userRequest("/api/payment/crypto", "POST", { profile_id: 3, amount: 50, crypto_type: "xmr" }));
    expect(wallet.status).toBe(400);
    expect((await wallet.json()).code).toBe("UNKNOWN_WALLET");

    const amount = await cryptoPOST(userRequest("/api/payment/crypto", "POST", { profile_id: 3, amount: "abc", crypto_type: "btc" }));
    expect((await amount.json()).code).toBe("INVALID_AMOUNT");

    const profile = await cryptoPOST(userRequest("/api/payment/crypto", "POST", { profile_id: 99, amount: 10, crypto_type: "btc" }));
    expect(profile.status).toBe(404);
    expect(runtimeMock.notifyOrder).not.toHaveBeenCalled();
  });

  it("sends messages, notifies the operator and serves incremental updates", async () => {
    const sent = await messagesPOST(userRequest("/api/chats/7/messages", "POST", { text: "  Hello  " }), params({ profileId: "7" }));
    expect(sent.status).toBe(201);
    const { message } = await sent.json();
    expect(message).toMatchObject({ id: 1, sender: "user", text: "Hello", is_read: false });
    expect(runtimeMock.notifyMessage).toHaveBeenCalledWith(
      expect.objectContaining({ profile_id: 7, telegram_user_id: "u1" }),
      expect.objectContaining({ id: 1, text: "Hello" }),
    );

    await messagesPOST(
      userRequest("/api/chats/7/messages", "POST", { text: "", attachment: { url: "/uploads/a/photo.png" } }),
      params({ profileId: "7" }),
    );

    const updates = await (await updatesGET(userRequest("/api/chats/7/updates?last_message_id=1"), params({ profileId: "7" }))).json();
    expect(updates.last_message_id).toBe(2);
    expect(updates.messages).toHaveLength(1);
    expect(updates.messages[0]).toMatchObject({ file_url: "/uploads/a/photo.png", file_type: "image", file_name: "photo.png" });

    const nothingNew = await (await updatesGET(userRequest("/api/chats/7/updates?last_message_id=2"), params({ profileId: "7" }))).json();
    expect(nothingNew).toEqual({ messages: [], last_message_id: 2 });

    const chats = await (await userChatsGET(userRequest("/api/user/chats"))).json();
    expect(chats.chats).toHaveLength(1);
    expect(chats.chats[0]).toMatchObject({ profile_id: 7, last_message: "📷 Image", unread_count: 0 });

    const otherUser = await (await messagesGET(userRequest("/api/chats/7/messages", "GET", undefined, "session-u2"), params({ profileId: "7" }))).json();
    expect(otherUser).toEqual({ chat_id: null, messages: [] });

    const empty = await messagesPOST(userRequest("/api/chats/7/messages", "POST", { text: "   " }), params({ profileId: "7" }));
    expect(empty.status).toBe(400);
  });

  it("moves the read cursor and counts operator replies as unread", async () => {
    await messagesPOST(userRequest("/api/chats/3/messages", "POST", { text: "Hi" }), params({ profileId: "3" }));
    await store.update((document) => {
      document.messages.push({
        id: 2,
        chat_id: 1,
        sender: "admin",
        text: "Hello there",
        created_at: new Date().toISOString(),
        is_read: false,
      });
    });

    const before = await (await userChatsGET(userRequest("/api/user/chats"))).json();
    expect(before.chats[0].unread_count).toBe(1);

    const marked = await markReadPOST(userRequest("/api/chats/3/mark_read", "POST"), params({ profileId: "3" }));
    expect(await marked.json()).toEqual({ success: true, last_read_message_id: 2 });

    const after = await (await userChatsGET(userRequest("/api/user/chats"))).json();
    expect(after.chats[0].unread_count).toBe(0);

    const missing = await markReadPOST(userRequest("/api/chats/7/mark_read", "POST"), params({ profileId: "7" }));
    expect(missing.status).toBe(404);
  });

  it("lets users delete only their own orders", async () => {
    const quote = await (await cryptoPOST(userRequest("/api/payment/crypto", "POST", {
      profile_id: 7,
      amount: 20,
      crypto_type: "btc",
    }))).json();

    const foreign = await orderDELETE(userRequest(`/api/orders/${quote.order_id}`, "DELETE", undefined, "session-u2"), params({ id: String(quote.order_id) }));
    expect(foreign.status).toBe(404);

    const own = await orderDELETE(userRequest(`/api/orders/${quote.order_id}`, "DELETE"), params({ id: String(quote.order_id) }));
    expect(await own.json()).toEqual({ success: true });
    expect((await store.load()).orders).toEqual([]);
  });
});
