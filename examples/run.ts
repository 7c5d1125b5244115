#!/usr/bin/env node

// Dispatcher script for running the examples
// Usage:
//   npm run example            - Run basic example (default)
//   npm run example -- [type]  - Run a specific example
//
// Types:
//   basic     Three fair d6 rolled together, with every analyzer table
//   weighted  A fair coin against a loaded one
//   list      Show detailed descriptions

const arg = process.argv[2];

async function runExample(modulePath: string, message: string) {
  console.log(`${message}\n`);
  await import(modulePath);
}

function showList() {
  console.log("Available Examples:\n");
  console.log("  basic     - Three fair d6 rolled together");
  console.log("              Prints the results, jackpots, face counts and combinations\n");
  console.log("  weighted  - A fair coin against a loaded one");
  console.log("              Shows weights and how the loaded face dominates the permutations\n");
  console.log("Usage:");
  console.log("  npm run example            - Run basic example (default)");
  console.log("  npm run example -- [type]  - Run a specific example\n");
}

(async () => {
  switch (arg) {
    case "basic":
    case undefined:
      await runExample("./basic-usage", "Running basic usage example...");
      break;

    case "weighted":
      await runExample("./weighted-dice", "Running weighted dice example...");
      break;

    case "list":
      showList();
      break;

    default:
      console.error(`Unknown example type: ${arg}\n`);
      showList();
      process.exit(1);
  }
})().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
