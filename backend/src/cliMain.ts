import { runCli } from "./cli";

runCli(process.stdin, process.stdout, process.stderr).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("movescan failed", error);
    process.exitCode = 1;
  }
);
