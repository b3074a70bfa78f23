import { NextResponse } from "next/server";
import { errorResponse } from "@core/http";
import { getStore } from "@core/runtime";
import { Settings } from "@core/settings";

export async function GET() {
  try {
    const document = await getStore().load();
    return NextResponse.json(Settings.publicView(document));
  } catch (error) {
    return errorResponse(error, "settings route");
  }
}
