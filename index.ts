// index.ts
import readline from "readline";
import { CommandHandler } from "./src/core/CommandHandler";
import { loadConfig } from "./src/core/Config";
import { LogFunctions } from "./src/core/LogFunctions";
import { createSessionStore } from "./src/core/SessionStore";

function main() {
  const config = loadConfig();
  LogFunctions.init();
  LogFunctions.info("Application started");

  const store = createSessionStore();
  const commands = new CommandHandler(store, { preset: config.preset, seed: config.seed });

  // -------------------------
  // Interactive console
  // -------------------------
  const consoleInterface = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
    historySize: 1000,
  });

  console.log(commands.handle("new").output);
  consoleInterface.prompt();

  consoleInterface.on("line", (input) => {
    const result = commands.handle(input);
    console.log(result.output);
    if (result.exit) {
      consoleInterface.close();
      return;
    }
    consoleInterface.prompt();
  });

  consoleInterface.on("close", () => process.exit(0));
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
