import { DomainError } from "./db";
import type { AppDocument, Banner, Settings as SettingsRecord } from "./document";

const BANNER_LIMITS = { text: 500, link: 500, link_text: 100 } as const;

export type SettingsPatch = {
    crypto_wallets?: Record<string, string>;
    bonus_percentage?: number;
    banner?: Partial<Banner>;
};

function checkLength(field: keyof typeof BANNER_LIMITS, value: string): string {
    const trimmed = value.trim();
    if (trimmed.length > BANNER_LIMITS[field]) {
        throw new DomainError("INVALID_SETTINGS", `banner.${field} must be at most ${BANNER_LIMITS[field]} characters`);
    }
    return trimmed;
}

export const Settings = {
    /** What the public app may see: the wallet table, the banner and the bonus rate. */
    publicView: (document: AppDocument) => {
        const { crypto_wallets, banner, bonus_percentage } = document.settings;
        return { crypto_wallets, banner, bonus_percentage };
    },

    /** Validates the whole patch before touching the document. */
    apply: (document: AppDocument, patch: SettingsPatch): SettingsRecord => {
        const next = structuredClone(document.settings);

        if (patch.crypto_wallets) {
            const wallets: Record<string, string> = {};
            for (const [type, address] of Object.entries(patch.crypto_wallets)) {
                const key = type.trim().toLowerCase();
                if (!/^[a-z0-9_]+$/.test(key)) {
                    throw new DomainError("INVALID_SETTINGS", `Invalid wallet type: ${type}`);
                }
                const value = address.trim();
                if (value) wallets[key] = value;
            }
            next.crypto_wallets = wallets;
        }

        if (patch.bonus_percentage !== undefined) {
            const pct = patch.bonus_percentage;
            if (!Number.isFinite(pct) || pct < 0 || pct > 100) {
                throw new DomainError("INVALID_SETTINGS", "bonus_percentage must be between 0 and 100");
            }
            next.bonus_percentage = pct;
        }

        if (patch.banner) {
            const banner = patch.banner;
            next.banner = {
                text: banner.text === undefined ? next.banner.text : checkLength("text", banner.text),
                link: banner.link === undefined ? next.banner.link : checkLength("link", banner.link),
                link_text: banner.link_text === undefined ? next.banner.link_text : checkLength("link_text", banner.link_text),
                visible: banner.visible ?? next.banner.visible,
            };
        }

        document.settings = next;
        return next;
    },
};
