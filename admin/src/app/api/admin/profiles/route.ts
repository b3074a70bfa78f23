import { NextResponse } from "next/server";
import { requireAdminAuth } from "@/lib/admin-auth";
import { errorResponse, readJson } from "@core/http";
import { Profiles } from "@core/profiles";
import { getStore } from "@core/runtime";
import { profileInputFrom } from "@/lib/profile-input";

export async function GET(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const document = await getStore().load();
    const profiles = [...document.profiles].sort((a, b) => b.id - a.id);
    return NextResponse.json({ profiles });
  } catch (error) {
    return errorResponse(error, "profiles list route");
  }
}

export async function POST(req: Request) {
  const authError = requireAdminAuth(req);
  if (authError) return authError;

  try {
    const input = profileInputFrom(await readJson(req));
    const profile = await getStore().update((document) => Profiles.create(document, input));
    console.log(`✅ Profile #${profile.id} created: ${profile.name}`);
    return NextResponse.json({ success: true, profile }, { status: 201 });
  } catch (error) {
    return errorResponse(error, "profile create route");
  }
}
