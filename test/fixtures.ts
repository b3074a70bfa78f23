import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createEmptyDocument, type AppDocument, type Profile } from "../src/document";

export function makeTempDir(prefix = "booking-"): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function makeProfile(id: number, overrides: Partial<Profile> = {}): Profile {
    return {
        id,
        name: `Profile ${id}`,
        age: 25,
        gender: "female",
        nationality: "Italian",
        city: "Rome",
        travel_cities: [],
        description: "",
        height: 170,
        weight: 55,
        chest: 90,
        photos: [`/static/photos/${id}.jpg`],
        visible: true,
        created_at: "2024-01-01T00:00:00.000Z",
        ...overrides,
    };
}

/** Empty document with profiles 3 and 7 and the wallet table from the test environment. */
export function seedDocument(): AppDocument {
    const document = createEmptyDocument();
    document.profiles.push(makeProfile(3), makeProfile(7));
    return document;
}

export function thrownCode(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
            return error.code;
        }
        throw error;
    }
    return undefined;
}
