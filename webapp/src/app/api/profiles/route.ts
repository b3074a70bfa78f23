import { NextResponse } from "next/server";
import { errorResponse, queryNumber } from "@core/http";
import { Profiles, type ProfileFilters } from "@core/profiles";
import { getStore } from "@core/runtime";

function range(query: URLSearchParams, field: string) {
  return { min: queryNumber(query, `${field}_min`), max: queryNumber(query, `${field}_max`) };
}

export async function GET(req: Request) {
  try {
    const query = new URL(req.url).searchParams;
    const filters: ProfileFilters = {
      city: query.get("city")?.trim() || undefined,
      nationality: query.get("nationality")?.trim() || undefined,
      travelCity: query.get("travel_city")?.trim() || undefined,
      gender: query.get("gender")?.trim() || undefined,
      age: range(query, "age"),
      height: range(query, "height"),
      weight: range(query, "weight"),
      chest: range(query, "chest"),
      page: queryNumber(query, "page"),
      limit: queryNumber(query, "limit"),
    };
    const document = await getStore().load();
    return NextResponse.json(Profiles.listVisible(document, filters));
  } catch (error) {
    return errorResponse(error, "profiles route");
  }
}
