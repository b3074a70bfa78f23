import fs from "node:fs/promises";
import path from "node:path";
import { createEmptyDocument, normalizeDocument, type AppDocument } from "./document";

export class DomainError extends Error {
    readonly code: string;

    constructor(code: string, message: string = code) {
        super(message);
        this.name = "DomainError";
        this.code = code;
    }
}

/** A writer tried to save a document loaded before somebody else's save. */
export class StoreConflictError extends DomainError {
    readonly expectedVersion: number;
    readonly actualVersion: number;

    constructor(expectedVersion: number, actualVersion: number) {
        super("STORE_CONFLICT", `Document changed on disk (expected v${expectedVersion}, found v${actualVersion})`);
        this.name = "StoreConflictError";
        this.expectedVersion = expectedVersion;
        this.actualVersion = actualVersion;
    }
}

export function hasErrorCode(error: unknown, code: string): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === code
    );
}

export type DocumentStoreOptions = {
    filePath: string;
    /** Reads younger than this are served from memory. */
    cacheTtlMs?: number;
    now?: () => number;
};

type DiskRead =
    | { kind: "missing" }
    | { kind: "corrupt"; error: unknown }
    | { kind: "ok"; document: AppDocument };

const DEFAULT_CACHE_TTL_MS = 5000;

/**
 * The JSON document behind every process. Reads are cached for a short
 * window; saves go to a temp sibling and are renamed over the canonical path,
 * and are rejected when the version on disk moved since the caller loaded.
 */
export class DocumentStore {
    readonly filePath: string;
    private readonly cacheTtlMs: number;
    private readonly now: () => number;
    private cache: AppDocument | null = null;
    private cachedAt = 0;
    private queue: Promise<unknown> = Promise.resolve();
    private preservedCorruption: string | null = null;

    constructor(options: DocumentStoreOptions) {
        this.filePath = options.filePath;
        this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
        this.now = options.now ?? Date.now;
    }

    get tempPath(): string {
        return `${this.filePath}.${process.pid}.tmp`;
    }

    async load(): Promise<AppDocument> {
        const fresh = this.freshCache();
        if (fresh) return structuredClone(fresh);

        return this.withLock(async () => {
            const cached = this.freshCache();
            if (cached) return structuredClone(cached);

            const document = await this.readDocument();
            this.remember(document);
            return structuredClone(document);
        });
    }

    /**
     * Persists the document and bumps its version in place, so the same
     * object can be saved again after further edits.
     */
    async save(document: AppDocument): Promise<void> {
        await this.withLock(async () => {
            const onDisk = await this.readFromDisk();
            const diskVersion = onDisk.kind === "ok" ? onDisk.document.version : 0;
            if (diskVersion !== document.version) {
                if (this.cache && this.cache.version !== diskVersion) this.invalidate();
                throw new StoreConflictError(document.version, diskVersion);
            }

            const next = structuredClone(document);
            next.version = document.version + 1;
            await this.writeAtomic(next);

            document.version = next.version;
            this.remember(next);
        });
    }

    /**
     * Load, mutate, save. A conflicting save is retried once against a
     * document read straight from disk, then surfaced.
     */
    async update<T>(mutate: (document: AppDocument) => T): Promise<T> {
        try {
            return await this.applyOnce(mutate);
        } catch (error) {
            if (!(error instanceof StoreConflictError)) throw error;
            console.warn(`⚠️ ${error.message}, retrying once`);
            this.invalidate();
            return this.applyOnce(mutate);
        }
    }

    invalidate(): void {
        this.cache = null;
        this.cachedAt = 0;
    }

    private async applyOnce<T>(mutate: (document: AppDocument) => T): Promise<T> {
        const document = await this.load();
        const result = mutate(document);
        await this.save(document);
        return result;
    }

    private freshCache(): AppDocument | null {
        const cached = this.cache;
        if (!cached) return null;
        return this.now() - this.cachedAt < this.cacheTtlMs ? cached : null;
    }

    private remember(document: AppDocument): void {
        this.cache = document;
        this.cachedAt = this.now();
    }

    private withLock<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private async readDocument(): Promise<AppDocument> {
        let result: DiskRead;
        try {
            result = await this.readFromDisk();
        } catch (error) {
            console.error(`❌ Error reading ${this.filePath}, serving an empty document`, error);
            return createEmptyDocument();
        }
        if (result.kind === "ok") return result.document;
        if (result.kind === "missing") return createEmptyDocument();

        console.error(`❌ Error loading data from ${this.filePath}, serving an empty document`, result.error);
        await this.preserveCorruptFile();
        return createEmptyDocument();
    }

    private async readFromDisk(): Promise<DiskRead> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf-8");
        } catch (error) {
            if (hasErrorCode(error, "ENOENT")) return { kind: "missing" };
            throw error;
        }

        try {
            return { kind: "ok", document: normalizeDocument(JSON.parse(raw)) };
        } catch (error) {
            return { kind: "corrupt", error };
        }
    }

    /** One copy per corrupt file version, identified by size and mtime. */
    private async preserveCorruptFile(): Promise<void> {
        const backupPath = `${this.filePath}.corrupt-${this.now()}`;
        try {
            const stat = await fs.stat(this.filePath);
            const signature = `${stat.size}:${stat.mtimeMs}`;
            if (signature === this.preservedCorruption) return;
            await fs.copyFile(this.filePath, backupPath);
            this.preservedCorruption = signature;
            console.warn(`⚠️ Corrupt data file copied to ${backupPath}`);
        } catch (error) {
            console.error("❌ Could not keep a copy of the corrupt data file", error);
        }
    }

    private async writeAtomic(document: AppDocument): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.tempPath, JSON.stringify(document, null, 2), "utf-8");
        try {
            await fs.rename(this.tempPath, this.filePath);
        } catch (error) {
            await fs.rm(this.tempPath, { force: true });
            throw error;
        }
    }
}
