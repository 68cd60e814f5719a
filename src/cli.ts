#!/usr/bin/env node

import { createProgram, toTailOptions } from "./cli/program.js";
import { createLogTail, isCmLogError } from "./cmlog/index.js";

function writeLine(text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(`${text}\n`, (err) => (err ? reject(err) : resolve()));
  });
}

const program = createProgram(async (path, options) => {
  const tail = createLogTail(toTailOptions(path, options, process.stdout.isTTY === true));

  const stop = () => tail.stop();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  try {
    await tail.pipeTo((item) => writeLine(typeof item === "string" ? item : JSON.stringify(item)));
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  if (isCmLogError(err)) {
    process.stderr.write(`cmlog: ${err.message}\n`);
  } else {
    process.stderr.write(`cmlog: unexpected error: ${String(err)}\n`);
  }
  process.exitCode = 1;
});
