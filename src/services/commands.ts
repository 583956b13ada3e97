import type { AsyncChannel } from "../channel.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { WatchlistRepository } from "../store/watchlist.js";
import { normalizeSymbol } from "../store/watchlist.js";
import type { StatusSnapshot } from "../types.js";
import { formatStatusMessage, formatWatchlist, HELP_TEXT } from "./alert-message.js";

const log = createLogger("commands");

const SYMBOL_PATTERN = /^[A-Z0-9][A-Z0-9.\-=^]{0,14}$/;

export type Command =
  | { type: "add"; symbol: string; name?: string }
  | { type: "remove"; symbol: string }
  | { type: "list" }
  | { type: "status" }
  | { type: "help" }
  | { type: "invalid"; message: string }
  | { type: "unknown"; text: string };

/** A text message from a chat, with a way to answer it. */
export interface InboundCommand {
  text: string;
  reply(text: string): Promise<void>;
}

export interface CommandContext {
  watchlist: WatchlistRepository;
  status(): Promise<StatusSnapshot>;
}

/**
 * Accepts "add SAP.DE SAP SE", "/remove sap.de" or "/list@some_bot".
 * Symbols are upper-cased.
 */
export function parseCommand(text: string): Command {
  const [head = "", ...args] = text.trim().split(/\s+/);
  const verb = head.replace(/^\//, "").replace(/@\S*$/, "").toLowerCase();

  switch (verb) {
    case "add": {
      const symbol = normalizeSymbol(args[0] ?? "");
      if (!SYMBOL_PATTERN.test(symbol)) return { type: "invalid", message: "Usage: /add SYMBOL [name]" };
      const name = args.slice(1).join(" ");
      return name ? { type: "add", symbol, name } : { type: "add", symbol };
    }
    case "remove": {
      const symbol = normalizeSymbol(args[0] ?? "");
      if (!SYMBOL_PATTERN.test(symbol)) return { type: "invalid", message: "Usage: /remove SYMBOL" };
      return { type: "remove", symbol };
    }
    case "list":
      return { type: "list" };
    case "status":
      return { type: "status" };
    case "help":
    case "start":
      return { type: "help" };
    default:
      return { type: "unknown", text };
  }
}

export async function executeCommand(command: Command, ctx: CommandContext): Promise<string> {
  switch (command.type) {
    case "add": {
      const { entry, outcome } = await ctx.watchlist.add({ symbol: command.symbol, name: command.name });
      if (outcome === "exists") return `${entry.symbol} is already on the watchlist.`;
      if (outcome === "reactivated") return `Reactivated ${entry.symbol} (${entry.name}).`;
      return `Added ${entry.symbol} (${entry.name}) to the watchlist.`;
    }
    case "remove":
      return (await ctx.watchlist.remove(command.symbol))
        ? `Removed ${command.symbol} from the watchlist.`
        : `${command.symbol} is not on the watchlist.`;
    case "list":
      return formatWatchlist(await ctx.watchlist.listActive());
    case "status":
      return formatStatusMessage(await ctx.status());
    case "invalid":
      return command.message;
    case "help":
    case "unknown":
      return HELP_TEXT;
  }
}

/**
 * Answers commands until the channel is closed. Returns how many were handled.
 */
export async function runCommandLoop(channel: AsyncChannel<InboundCommand>, ctx: CommandContext): Promise<number> {
  let handled = 0;
  for await (const message of channel) {
    const command = parseCommand(message.text);
    log.info(`Received ${command.type} command`);

    let reply: string;
    try {
      reply = await executeCommand(command, ctx);
    } catch (e) {
      log.error(`${command.type} command failed: ${errorMessage(e)}`);
      reply = `Command failed: ${errorMessage(e)}`;
    }

    try {
      await message.reply(reply);
    } catch (e) {
      log.error(`Could not send reply: ${errorMessage(e)}`);
    }
    handled++;
  }
  log.info("Command channel closed");
  return handled;
}
