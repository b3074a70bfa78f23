import { DomainError } from "@core/db";
import { numberField, textField, type JsonBody } from "@core/http";
import type { ProfileInput } from "@core/profiles";

function optionalMeasure(body: JsonBody, key: string): number | null {
  const value = numberField(body, key);
  if (value === undefined) return null;
  if (!Number.isFinite(value) || value < 0) {
    throw new DomainError("INVALID_PROFILE", `Invalid ${key}`);
  }
  return value;
}

// Accepts a JSON array or a comma-separated string, as the dashboard form sends either.
function stringList(body: JsonBody, key: string): string[] {
  const value = body[key];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  if (typeof value === "string") return value.split(",");
  return [];
}

export function profileInputFrom(body: JsonBody): ProfileInput {
  return {
    name: textField(body, "name"),
    age: optionalMeasure(body, "age"),
    gender: textField(body, "gender"),
    nationality: textField(body, "nationality"),
    city: textField(body, "city"),
    travel_cities: stringList(body, "travel_cities"),
    description: textField(body, "description"),
    height: optionalMeasure(body, "height"),
    weight: optionalMeasure(body, "weight"),
    chest: optionalMeasure(body, "chest"),
    photos: stringList(body, "photos"),
  };
}
