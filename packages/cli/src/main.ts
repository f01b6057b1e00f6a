import { loadDotEnvIfPresent } from "@issuecorpus/shared";

import { scrapeCommand } from "./commands/scrape";

type CommandResult = void | Promise<void>;

function printHelp(): void {
  console.log("issue-corpus CLI");
  console.log("");
  console.log("Commands:");
  console.log("  scrape --projects <KEY...> --output <file.jsonl> [--checkpoint <file>] [--max-issues N] [--page-size N]");
}

async function main(): Promise<void> {
  loadDotEnvIfPresent();

  let [cmd, ...rest] = process.argv.slice(2);
  // npm forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  let result: CommandResult;
  switch (cmd) {
    case "scrape":
      result = scrapeCommand(rest);
      break;
    default:
      printHelp();
      result = undefined;
      break;
  }

  await result;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
