/**
 * pagechat Example — Programmatic API Usage (TypeScript)
 *
 * Scrapes one page, prints its summary and asks a question about it.
 * Needs GEMINI_API_KEY and a local Chrome (or CHROME_PATH).
 *
 * Usage:
 *   npx tsx examples/scrape-and-ask.ts https://example.com "What is this page for?"
 */

import {
    ScrapeSession,
    buildOrchestratorFromConfig,
    describeFailure,
    formatScrapeSummary,
    loadConfig,
    requireApiKey,
} from "../src/index.js";

async function main(): Promise<void> {
    const [url = "https://example.com", question = "What is this page about?"] = process.argv.slice(2);

    const config = loadConfig();
    requireApiKey(config);

    const orchestrator = buildOrchestratorFromConfig(config);
    orchestrator.onTransition(({ from, to }) => console.log(`  ${from} → ${to}`));

    const session = new ScrapeSession(orchestrator);

    const scraped = await session.scrape(url);
    if (!scraped.ok) {
        console.error(describeFailure(scraped.error));
        process.exitCode = 1;
        return;
    }
    console.log(formatScrapeSummary(scraped.value));

    const answer = await session.ask(question);
    if (!answer.ok) {
        console.error(describeFailure(answer.error));
        process.exitCode = 1;
        return;
    }
    console.log(`\nQ: ${answer.value.query}\nA: ${answer.value.response}`);
}

main().catch(console.error);
