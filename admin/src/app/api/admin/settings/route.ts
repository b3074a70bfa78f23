import { NextResponse } from "next/server";
import { requireAdminAuth } from "@/lib/admin-auth";
import { DomainError } from "@core/db";
import { errorResponse, numberField, readJson, type JsonBody } from "@core/http";
import { getStore } from "@core/runtime";
import { Settings, type SettingsPatch } from "@core/settings";

function walletsFrom(value: unknown): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new DomainError("INVALID_SETTINGS", "crypto_wallets must be an object");
  }
  const wallets: Record<string, string> = {};
  for (const [type, address] of Object.entries(value)) {
    if (typeof address !== "string") {
      throw new DomainError("INVALID_SETTINGS", `Wallet ${type} must be a string`);
    }
    wallets[type] = address;
  }
  return wallets;
}

function bannerFrom(value: unknown): SettingsPatch["banner"] {
  if (value === undefined) return undefined;
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new DomainError("INVALID_SETTINGS", "banner must be an object");
  }
  const raw: JsonBody = Object.fromEntries(Object.entries(value));
  const banner: SettingsPatch["banner"] = {};
  if (typeof raw.text === "string") banner.text = raw.text;
  if (typeof raw.link === "string") banner.link = raw.link;
  if (typeof raw.link_text === "string") banner.link_text = raw.link_text;
  if (typeof raw.visible === "boolean") banner.visible = raw.visible;
  return banner;
}

export async function GET(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const document = await getStore().load();
    return NextResponse.json({ settings: document.settings });
  } catch (error) {
    return errorResponse(error, "settings route");
  }
}

export async function POST(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const payload = await readJson(req);
    const patch: SettingsPatch = {
      crypto_wallets: walletsFrom(payload.crypto_wallets),
      bonus_percentage: numberField(payload, "bonus_percentage"),
      banner: bannerFrom(payload.banner),
    };
    const settings = await getStore().update((document) => Settings.apply(document, patch));
    console.log("✅ Settings updated");
    return NextResponse.json({ success: true, settings });
  } catch (error) {
    return errorResponse(error, "settings update route");
  }
}
