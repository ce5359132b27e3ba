import { runCli } from "./cli/program";
import { closeLogger } from "./services/logger";

runCli(process.argv).then(
  (code) => {
    closeLogger();
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    closeLogger();
    process.exitCode = 1;
  },
);
