import { NextResponse } from "next/server";
import { errorResponse } from "@core/http";
import { Profiles } from "@core/profiles";
import { getStore } from "@core/runtime";

export async function GET() {
  try {
    const document = await getStore().load();
    return NextResponse.json(Profiles.filterOptions(document));
  } catch (error) {
    return errorResponse(error, "filters route");
  }
}
