import { Bot, type BotConfig, type Context } from "grammy";
import { CONFIG } from "./config";
import { hasErrorCode, type DocumentStore } from "./db";
import { Chats, PAYMENT_KEYWORD, type AppendResult } from "./chats";
import { ReplyRoutes, type RouteTarget } from "./reply_routes";
import {
    ReplyModes,
    buildChatList,
    buildHelpText,
    encodeUser,
    escapeHtml,
    parseChatCallback,
} from "./bridge_helpers";

export type BridgeDeps = {
    store: DocumentStore;
    adminIds: number[];
    replyModes?: ReplyModes;
};

export type BridgeBotOptions = {
    token?: string;
    client?: BotConfig<Context>["client"];
};

export function createBridgeBot(options: BridgeBotOptions = {}): Bot {
    return new Bot(options.token ?? CONFIG.BOT_TOKEN, { client: options.client });
}

function describeTarget(target: RouteTarget): string {
    return `анкета #${target.profileId}, пользователь ${escapeHtml(encodeUser(target.telegramUserId))}`;
}

/**
 * Wires operator commands, buttons and replies to the chat and order state.
 * Updates from anyone outside `adminIds` are dropped.
 */
export function registerBridgeHandlers(bot: Bot, deps: BridgeDeps): ReplyModes {
    const { store, adminIds } = deps;
    const replyModes = deps.replyModes ?? new ReplyModes();

    async function deliver(target: RouteTarget, text: string): Promise<AppendResult> {
        return store.update((document) => {
            const chat = Chats.findOrCreate(document, target.profileId, target.telegramUserId);
            return Chats.appendMessage(document, { chatId: chat.id, sender: "admin", text });
        });
    }

    async function deliverAndReport(ctx: Context, target: RouteTarget, text: string): Promise<void> {
        let result: AppendResult;
        try {
            result = await deliver(target, text);
        } catch (error) {
            if (hasErrorCode(error, "PROFILE_NOT_FOUND")) {
                await ctx.reply("❌ Анкета не найдена");
                return;
            }
            throw error;
        }

        const lines = [`✅ Сообщение отправлено (${describeTarget(target)})`];
        if (result.bookedOrder) {
            lines.push(`💰 Заказ <code>${result.bookedOrder.order_number}</code> подтвержден`);
        }
        await ctx.reply(lines.join("\n"), { parse_mode: "HTML" });
    }

    async function sendChatList(ctx: Context): Promise<void> {
        const document = await store.load();
        const { text, keyboard } = buildChatList(document.chats);
        await ctx.reply(text, { parse_mode: "HTML", reply_markup: keyboard });
    }

    bot.use(async (ctx, next) => {
        const fromId = ctx.from?.id;
        if (fromId === undefined || !adminIds.includes(fromId)) {
            if (fromId !== undefined) console.warn(`⚠️ Ignoring update from non-admin ${fromId}`);
            return;
        }
        await next();
    });

    bot.command(["start", "help"], async (ctx) => {
        await ctx.reply(buildHelpText(), { parse_mode: "HTML" });
    });

    bot.command("chats", sendChatList);

    bot.command("cancel", async (ctx) => {
        const wasReplying = ctx.from ? replyModes.cancel(ctx.from.id) : false;
        await ctx.reply(wasReplying ? "✅ Режим ответа отменен" : "ℹ️ Вы не в режиме ответа");
    });

    bot.callbackQuery("list_chats", async (ctx) => {
        await ctx.answerCallbackQuery();
        await sendChatList(ctx);
    });

    bot.callbackQuery(/^(reply|payment)_/, async (ctx) => {
        const parsed = parseChatCallback(ctx.callbackQuery.data);
        if (!parsed) {
            await ctx.answerCallbackQuery({ text: "Неизвестная команда" });
            return;
        }
        const target = { profileId: parsed.profileId, telegramUserId: parsed.telegramUserId };

        if (parsed.action === "reply") {
            replyModes.enter(ctx.callbackQuery.from.id, target);
            await ctx.answerCallbackQuery();
            await ctx.reply(
                `✍️ Режим ответа: ${describeTarget(target)}\nНапишите сообщение или /cancel`,
                { parse_mode: "HTML" },
            );
            return;
        }

        await ctx.answerCallbackQuery({ text: "Подтверждаем оплату…" });
        await deliverAndReport(ctx, target, PAYMENT_KEYWORD);
    });

    bot.on("message:text", async (ctx) => {
        const text = ctx.message.text;
        if (text.startsWith("/")) {
            await ctx.reply("❓ Неизвестная команда. /help");
            return;
        }

        const repliedTo = ctx.message.reply_to_message;
        if (repliedTo) {
            const document = await store.load();
            const target = ReplyRoutes.lookup(document, ctx.message.chat.id, repliedTo.message_id);
            if (target) {
                await deliverAndReport(ctx, target, text);
                return;
            }
        }

        const active = ctx.from ? replyModes.get(ctx.from.id) : null;
        if (active) {
            await deliverAndReport(ctx, active, text);
            return;
        }

        await ctx.reply("ℹ️ Ответьте на уведомление или нажмите «✉️ Ответить». /chats — список чатов");
    });

    return replyModes;
}

async function settlesWithin(task: Promise<void>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const settled = await Promise.race([
        task.then(() => true, () => true),
        new Promise<boolean>((resolve) => {
            timer = setTimeout(() => resolve(false), ms);
        }),
    ]);
    clearTimeout(timer);
    return settled;
}

export type TelegramBridgeOptions = {
    pollTimeoutSeconds?: number;
    errorBackoffMs?: number;
};

/**
 * Long-polling loop over getUpdates. The offset advances past every update
 * before it is handled, so a failing update is not fetched again.
 */
export class TelegramBridge {
    private offset = 0;
    private running = false;
    private loop: Promise<void> | null = null;
    private controller = new AbortController();
    private wake: (() => void) | null = null;
    private readonly pollTimeoutSeconds: number;
    private readonly errorBackoffMs: number;

    constructor(private readonly bot: Bot, options: TelegramBridgeOptions = {}) {
        this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? CONFIG.POLL_TIMEOUT_SECONDS;
        this.errorBackoffMs = options.errorBackoffMs ?? CONFIG.POLL_ERROR_BACKOFF_MS;
        // Calls made from handlers are cancelled together with the long poll.
        bot.api.config.use((prev, method, payload, signal) =>
            prev(method, payload, signal ?? this.controller.signal),
        );
    }

    get isRunning(): boolean {
        return this.running;
    }

    get currentOffset(): number {
        return this.offset;
    }

    start(): void {
        if (this.loop) return;
        this.running = true;
        this.controller = new AbortController();
        this.loop = this.run();
        console.log("✅ Telegram bridge started");
    }

    /**
     * Lets the current iteration finish for up to `graceMs`, then aborts the
     * in-flight Bot API calls. A loop still busy after another `graceMs` is
     * left behind.
     */
    async stop(graceMs: number = CONFIG.SHUTDOWN_GRACE_MS): Promise<void> {
        const loop = this.loop;
        if (!loop) return;
        this.running = false;
        this.wake?.();

        if (!(await settlesWithin(loop, graceMs))) {
            console.warn(`⚠️ Telegram bridge still busy after ${graceMs}ms, cancelling`);
            this.controller.abort();
            if (!(await settlesWithin(loop, graceMs))) {
                console.error(`❌ Telegram bridge did not exit ${graceMs}ms after cancelling, detaching it`);
            }
        }
        this.loop = null;
        console.log("🛑 Telegram bridge stopped");
    }

    private async run(): Promise<void> {
        while (this.running) {
            try {
                await this.bot.init(this.controller.signal);
                const updates = await this.bot.api.getUpdates(
                    {
                        offset: this.offset,
                        timeout: this.pollTimeoutSeconds,
                        allowed_updates: ["message", "callback_query"],
                    },
                    this.controller.signal,
                );
                for (const update of updates) {
                    this.offset = update.update_id + 1;
                    try {
                        await this.bot.handleUpdate(update);
                    } catch (error) {
                        console.error(`❌ Failed to handle update ${update.update_id}`, error);
                        await this.sleep(this.errorBackoffMs);
                    }
                    if (!this.running) break;
                }
            } catch (error) {
                if (!this.running) break;
                console.error("❌ Telegram polling error", error);
                await this.sleep(this.errorBackoffMs);
            }
        }
    }

    private sleep(ms: number): Promise<void> {
        if (!this.running) return Promise.resolve();
        return new Promise((resolve) => {
            let timer: NodeJS.Timeout | undefined;
            const done = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
            this.wake = done;
            timer = setTimeout(done, ms);
        });
    }
}
