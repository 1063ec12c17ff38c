/**
 * generate: answers every task in a JSONL file and writes the submission.
 *
 * Usage:
 *   npm run generate -- --input data/reference_taskB.jsonl --output data/predictions.jsonl
 *
 * API keys come from GROQ_API_KEYS (comma separated) in the environment or .env.
 */

import ora from "ora";
import { runBatch, type BatchSummary } from "../src/batch/orchestrator";
import { loadConfig } from "../src/config";
import { ResponseDispatcher } from "../src/dispatch/dispatcher";
import { createCredentialProviders } from "../src/llm/factory";
import { createLogger, errorMessage } from "../src/utils/logging";

interface Options {
    input: string | null;
    output: string | null;
    delayMs: number | null;
}

const logger = createLogger("Script.Generate");

function parseArgs(argv: string[]): Options {
    const options: Options = {
        input: null,
        output: null,
        delayMs: null,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];

        switch (arg) {
            case "--input":
                if (!next) throw new Error("--input requires a path");
                options.input = next;
                i++;
                break;
            case "--output":
                if (!next) throw new Error("--output requires a path");
                options.output = next;
                i++;
                break;
            case "--delay-ms":
                if (!next) throw new Error("--delay-ms requires milliseconds");
                options.delayMs = Number(next);
                i++;
                break;
            case "--help":
                printHelp();
                process.exit(0);
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    if (
        options.delayMs !== null &&
        (!Number.isFinite(options.delayMs) || options.delayMs < 0)
    ) {
        throw new Error("--delay-ms must be a number >= 0");
    }

    return options;
}

function printHelp() {
    console.log(`Usage:
  tsx script/generate.ts [options]

Options:
  --input <path>     Task file, JSONL (default: RAG_INPUT_FILE)
  --output <path>    Prediction file, JSONL (default: RAG_OUTPUT_FILE)
  --delay-ms <ms>    Pause between tasks (default: RAG_TASK_DELAY_MS or 100)
  --help             Show this help

Environment:
  GROQ_API_KEYS      Comma separated API keys, rotated in order
  GROQ_MODEL         Model id (default: meta-llama/llama-4-scout-17b-16e-instruct)
  GROQ_BASE_URL      OpenAI-compatible base URL
  LOG_LEVEL          debug | info | warn | error`);
}

function printSummary(summary: BatchSummary) {
    const rule = "=".repeat(80);
    console.log(`\n${rule}\nGENERATION STATISTICS\n${rule}`);
    console.log(`Total tasks processed: ${summary.processed}/${summary.totalTasks}`);
    console.log(`  Answerable tasks: ${summary.answerable}`);
    console.log(`  Unanswerable tasks: ${summary.unanswerable}`);
    console.log(`Failed tasks: ${summary.failures.length}`);
    console.log(`Skipped lines: ${summary.skippedLines}`);
    console.log(
        `API keys exhausted: ${summary.credentialsExhausted}/${summary.credentialsTotal}`,
    );
    if (summary.aborted) {
        console.log("Stopped early: all API keys exhausted");
    }
    console.log(`Output: ${summary.outputFile}`);
    console.log(rule);
    console.log(
        "Next: npm run check-format -- <output>, then npm run validate-quality",
    );
}

async function main() {
    const options = parseArgs(process.argv.slice(2));
    const config = loadConfig({ dotenv: true });

    const inputFile = options.input ?? config.inputFile;
    const outputFile = options.output ?? config.outputFile;
    if (!inputFile) throw new Error("No input file; pass --input or set RAG_INPUT_FILE");
    if (!outputFile) throw new Error("No output file; pass --output or set RAG_OUTPUT_FILE");

    const dispatcher = new ResponseDispatcher({
        providers: createCredentialProviders(config),
        timeoutMs: config.requestTimeoutMs,
    });
    logger.info("generator_ready", {
        keys: config.apiKeys.length,
        model: config.model,
        source: inputFile,
        target: outputFile,
    });

    const spinner = ora("Generating responses").start();
    let summary: BatchSummary;
    try {
        summary = await runBatch({
            inputFile,
            outputFile,
            generator: dispatcher,
            rotator: dispatcher.rotator,
            delayMs: options.delayMs ?? config.taskDelayMs,
            onProgress: ({ completed, total }) => {
                spinner.text = `Generating responses ${completed}/${total}`;
            },
        });
    } catch (error) {
        spinner.fail("Generation failed");
        throw error;
    }

    if (summary.aborted) {
        spinner.warn(`Stopped after ${summary.processed}/${summary.totalTasks} tasks`);
    } else {
        spinner.succeed(`Generated ${summary.processed}/${summary.totalTasks} responses`);
    }
    printSummary(summary);

    if (summary.aborted) process.exitCode = 1;
}

main().catch((error) => {
    const message =
        error instanceof Error ? (error.stack ?? error.message) : errorMessage(error);
    logger.error("fatal", { error: message });
    process.exit(1);
});
