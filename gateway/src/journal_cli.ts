import path from "node:path";
import { fileURLToPath } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { errorMessage } from "./errors.js";
import { createReplicationJournal, type TaskStatus } from "./journal.js";

const STATUSES = ["PENDING", "IN_FLIGHT", "FAILED"] as const;

function defaultJournalPath(): string {
  return process.env.JOURNAL_PATH || path.join(process.env.DATA_DIR || ".data", "journal.jsonl");
}

/**
 * Offline inspection of a gateway's replication journal. Run it while the
 * gateway is stopped: both processes append to the same file.
 */
export async function runJournalCli(args: string[], write: (line: string) => void = (l) => process.stdout.write(l + "\n")) {
  await yargs(args)
    .scriptName("replistore-journal")
    .option("journal", { type: "string", default: defaultJournalPath(), describe: "path to journal.jsonl" })
    .command(
      "list",
      "print tasks as JSON lines",
      (y) =>
        y
          .option("status", { type: "string", choices: STATUSES })
          .option("key", { type: "string" })
          .option("target", { type: "string" }),
      (argv) => {
        const journal = createReplicationJournal({ path: argv.journal });
        journal.open();
        const status: TaskStatus | undefined = STATUSES.find((s) => s === argv.status);
        for (const task of journal.list({ status, key: argv.key, target: argv.target })) {
          write(JSON.stringify(task));
        }
      }
    )
    .command(
      "retry",
      "move FAILED tasks back to PENDING with a fresh attempt budget",
      (y) => y.option("key", { type: "string", demandOption: true }).option("target", { type: "string" }),
      (argv) => {
        const journal = createReplicationJournal({ path: argv.journal });
        journal.open();
        const retried = journal.retry(argv.key, argv.target);
        write(JSON.stringify({ retried: retried.map((t) => t.target) }));
      }
    )
    .command(
      "stats",
      "count tasks by status",
      (y) => y,
      (argv) => {
        const journal = createReplicationJournal({ path: argv.journal });
        const replay = journal.open();
        write(JSON.stringify({ ...journal.counts(), resumed: replay.resumed }));
      }
    )
    .demandCommand(1)
    .strict()
    .fail((msg, err) => {
      throw err || new Error(msg);
    })
    .parseAsync();
}

const modulePath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (modulePath === entryPath) {
  runJournalCli(hideBin(process.argv)).catch((err) => {
    process.stderr.write(errorMessage(err) + "\n");
    process.exit(1);
  });
}
