#!/usr/bin/env node

/**
 * pagechat CLI — scrape a page and ask questions about it.
 */

import { Command } from "commander";
import chalk from "chalk";
import { createInterface } from "node:readline";
import {
    loadConfig, buildOrchestratorFromConfig, requireApiKey, ConfigError,
    type AppConfig,
} from "../utils/config.js";
import { parseLogLevel, setGlobalLogLevel } from "../utils/logger.js";
import { describeFailure } from "../core/errors.js";
import { ScrapeSession } from "../core/session.js";
import { SsrfGuard } from "../scraper/ssrf.js";
import { validateUrl } from "../scraper/validate.js";
import { formatScrapeSummary } from "../scraper/format.js";
import { VERSION } from "../index.js";

const program = new Command();

interface GlobalOptions {
    config?: string;
    logLevel?: string;
}

// ── Helpers ───────────────────────────────────────────────────

function banner(): void {
    console.log("");
    console.log(chalk.cyan("  ◈  ") + chalk.bold.white("pagechat") + chalk.dim(` v${VERSION}`));
    console.log(chalk.dim("  Scrape a page, then ask about it"));
    console.log(chalk.dim("  ─".repeat(22)));
    console.log("");
}

function indent(text: string): string {
    return `  ${text.split("\n").join("\n  ")}`;
}

function success(msg: string): void { console.log(chalk.green(`  ✓ ${msg}`)); }
function warn(msg: string): void { console.log(chalk.yellow(`  ⚠ ${msg}`)); }
function fail(msg: string): void { console.log(chalk.red(`  ✗ ${msg}`)); }

function config(): AppConfig {
    return loadConfig({ path: program.opts<GlobalOptions>().config });
}

// ── CLI Setup ─────────────────────────────────────────────────

program
    .name("pagechat")
    .description("◈ pagechat — scrape a web page and chat about its content")
    .version(VERSION)
    .option("-c, --config <path>", "YAML config file (default: ./pagechat.yaml when present)")
    .option("-l, --log-level <level>", "Log level (debug, info, warn, error, silent)")
    .hook("preAction", () => {
        const { logLevel } = program.opts<GlobalOptions>();
        if (!logLevel) return;
        const level = parseLogLevel(logLevel);
        if (level === undefined) throw new ConfigError(`Unknown log level: ${logLevel}`);
        setGlobalLogLevel(level);
    });

// ── Scrape ────────────────────────────────────────────────────

program
    .command("scrape")
    .description("Scrape a URL and print a summary of what was found")
    .argument("<url>", "Page to scrape")
    .option("--json", "Print the extracted document as JSON")
    .action(async (url: string, opts: { json?: boolean }) => {
        const orchestrator = buildOrchestratorFromConfig(config());
        const result = await orchestrator.scrape(url);

        if (!result.ok) {
            fail(describeFailure(result.error));
            process.exitCode = 1;
            return;
        }

        if (opts.json) {
            console.log(JSON.stringify(result.value, null, 2));
            return;
        }
        success(url);
        console.log(indent(formatScrapeSummary(result.value)));
    });

// ── Check ─────────────────────────────────────────────────────

program
    .command("check")
    .description("Run URL validation and the SSRF guard without fetching")
    .argument("<url>", "URL to check")
    .action(async (url: string) => {
        const { security } = config();

        const validation = validateUrl(url, security);
        if (!validation.valid) {
            fail(describeFailure({ kind: "url-invalid", message: validation.reason }));
            process.exitCode = 1;
            return;
        }

        const guard = new SsrfGuard({ blockedIpPrefixes: security.blockedIpPrefixes });
        const safety = await guard.check(validation.url);
        if (!safety.safe) {
            fail(describeFailure({
                kind: "ssrf-blocked",
                message: safety.reason,
                rule: safety.rule,
                hostname: safety.hostname,
                address: safety.address,
            }));
            console.log(chalk.dim(`  rule: ${safety.rule}${safety.address ? `, address: ${safety.address}` : ""}`));
            process.exitCode = 1;
            return;
        }

        success(`${safety.hostname} is safe to scrape`);
        for (const address of safety.addresses) console.log(chalk.dim(`    ${address}`));
    });

// ── Ask ───────────────────────────────────────────────────────

program
    .command("ask")
    .description("Scrape a URL and answer one question about it")
    .argument("<url>", "Page to scrape")
    .argument("<question...>", "Question about the page")
    .action(async (url: string, words: string[]) => {
        const cfg = config();
        requireApiKey(cfg);

        const session = new ScrapeSession(buildOrchestratorFromConfig(cfg));
        const scraped = await session.scrape(url);
        if (!scraped.ok) {
            fail(describeFailure(scraped.error));
            process.exitCode = 1;
            return;
        }

        const answer = await session.ask(words.join(" "));
        if (!answer.ok) {
            fail(describeFailure(answer.error));
            process.exitCode = 1;
            return;
        }
        console.log(answer.value.response);
    });

// ── Chat ──────────────────────────────────────────────────────

program
    .command("chat")
    .description("Interactive session: scrape pages and ask questions")
    .argument("[url]", "Page to scrape first")
    .action(async (url: string | undefined) => {
        const cfg = config();
        requireApiKey(cfg);

        banner();
        const session = new ScrapeSession(buildOrchestratorFromConfig(cfg));

        if (url) await scrapeInto(session, url);
        await interactiveLoop(session);
    });

async function scrapeInto(session: ScrapeSession, url: string): Promise<void> {
    process.stdout.write(chalk.dim("  Scraping..."));
    const result = await session.scrape(url);
    process.stdout.write("\r" + " ".repeat(30) + "\r");

    if (!result.ok) {
        fail(describeFailure(result.error));
        if (session.url) console.log(chalk.dim(`  Still chatting about ${session.url}`));
        return;
    }
    success(url);
    console.log(indent(formatScrapeSummary(result.value)));
    console.log("");
}

async function interactiveLoop(session: ScrapeSession): Promise<void> {
    console.log(chalk.dim("  Ask a question and press Enter. /help for commands.\n"));

    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: chalk.cyan("  ◈ > ") });
    rl.prompt();

    for await (const line of rl) {
        const input = line.trim();
        if (!input) { rl.prompt(); continue; }

        if (input === "/quit" || input === "/exit") { rl.close(); return; }

        if (input === "/help") {
            console.log(chalk.dim("\n  Commands:"));
            console.log(chalk.dim("    /scrape <url>  — Scrape a new page (replaces the current one)"));
            console.log(chalk.dim("    /summary       — Summary of the current page"));
            console.log(chalk.dim("    /links         — Links on the current page"));
            console.log(chalk.dim("    /clear         — Drop the page and chat history"));
            console.log(chalk.dim("    /quit          — Exit\n"));
            rl.prompt(); continue;
        }

        if (input.startsWith("/scrape")) {
            const target = input.slice("/scrape".length).trim();
            if (!target) warn("Usage: /scrape <url>");
            else await scrapeInto(session, target);
            rl.prompt(); continue;
        }

        if (input === "/summary") {
            if (session.document) console.log(`\n${indent(formatScrapeSummary(session.document))}\n`);
            else warn("No page scraped yet");
            rl.prompt(); continue;
        }

        if (input === "/links") {
            const links = session.document?.links ?? [];
            if (links.length === 0) console.log(chalk.dim("  No links.\n"));
            else console.log(`${links.map((l) => `    ${l}`).join("\n")}\n`);
            rl.prompt(); continue;
        }

        if (input === "/clear") {
            session.clear();
            success("Cleared");
            rl.prompt(); continue;
        }

        if (input.startsWith("/")) { warn(`Unknown command: ${input}`); rl.prompt(); continue; }

        process.stdout.write(chalk.dim("  Thinking..."));
        const answer = await session.ask(input);
        process.stdout.write("\r" + " ".repeat(30) + "\r");

        if (answer.ok) console.log(`\n${indent(answer.value.response)}\n`);
        else fail(describeFailure(answer.error));
        rl.prompt();
    }
}

program.parseAsync().catch((err: unknown) => {
    if (err instanceof ConfigError) fail(`Config error: ${err.message}`);
    else fail(err instanceof Error ? err.message : String(err));
    process.exit(1);
});
