import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { FileSessionDirectory } from "../src/sessions";
import { makeTempDir, removeDir } from "./fixtures";

const NOW = Date.parse("2024-05-01T12:00:00.000Z");

describe("FileSessionDirectory", () => {
    let dir = "";
    let filePath = "";

    beforeEach(() => {
        dir = makeTempDir("sessions-");
        filePath = path.join(dir, "sessions.json");
    });

    afterEach(() => {
        vi.restoreAllMocks();
        removeDir(dir);
    });

    function writeTable(table: unknown): void {
        fs.writeFileSync(filePath, JSON.stringify(table));
    }

    it("resolves a live session to its Telegram user", async () => {
        writeTable({
            abc: { telegram_id: 42, user_data: { first_name: "Anna", username: "anna" }, expires_at: "2024-05-01T13:00:00.000Z" },
        });
        const directory = new FileSessionDirectory(filePath, () => NOW);

        expect(await directory.resolve("abc")).toEqual({ telegramUserId: "42", firstName: "Anna", username: "anna" });
        expect(await directory.resolve("other")).toBeNull();
    });

    it("treats expired, malformed and inherited entries as signed out", async () => {
        writeTable({
            old: { telegram_id: 42, user_data: {}, expires_at: "2024-05-01T12:00:00.000Z" },
            nouser: { user_data: {}, expires_at: "2024-05-02T00:00:00.000Z" },
            nodate: { telegram_id: 7, user_data: {} },
        });
        const directory = new FileSessionDirectory(filePath, () => NOW);

        expect(await directory.resolve("old")).toBeNull();
        expect(await directory.resolve("nouser")).toBeNull();
        expect(await directory.resolve("nodate")).toBeNull();
        expect(await directory.resolve("toString")).toBeNull();
    });

    it("picks up sessions written after it was created", async () => {
        const directory = new FileSessionDirectory(filePath, () => NOW);
        expect(await directory.resolve("abc")).toBeNull();

        writeTable({ abc: { telegram_id: "u1", user_data: { first_name: "Anna" }, expires_at: "2024-05-02T00:00:00.000Z" } });

        expect(await directory.resolve("abc")).toEqual({ telegramUserId: "u1", firstName: "Anna", username: "" });
    });

    it("logs an unreadable table and signs nobody in", async () => {
        const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
        fs.writeFileSync(filePath, "{ not json");

        expect(await new FileSessionDirectory(filePath, () => NOW).resolve("abc")).toBeNull();
        expect(errors).toHaveBeenCalledWith(`❌ Error loading sessions from ${filePath}`, expect.any(SyntaxError));
    });
});
