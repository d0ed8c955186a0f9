// server.ts: HTTP driver, games as JSON resources

import { loadConfig } from "./src/core/Config";
import { createApplication } from "./src/core/HttpApplication";
import { LogFunctions } from "./src/core/LogFunctions";
import { createSessionStore } from "./src/core/SessionStore";

const config = loadConfig();
LogFunctions.init();
LogFunctions.info("Application started");

const application = createApplication({ store: createSessionStore(), seed: config.seed });

const server = application.listen(config.port, () => {
  LogFunctions.info(`Listening on port ${config.port}`);
});

server.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EADDRINUSE") {
    LogFunctions.error(`Port ${config.port} is busy`);
    process.exit(1);
  }
  throw err;
});
