import 'dotenv/config';

import { runCli } from './cli.js';

const controller = new AbortController();
const cancel = (signal: NodeJS.Signals): void => {
  process.stderr.write(`${signal} received; finishing in-flight updates\n`);
  controller.abort();
};
process.once('SIGINT', cancel);
process.once('SIGTERM', cancel);

try {
  process.exitCode = await runCli({
    argv: process.argv.slice(2),
    env: process.env,
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    signal: controller.signal,
  });
} catch (error) {
  process.stderr.write(`Unexpected failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
} finally {
  process.off('SIGINT', cancel);
  process.off('SIGTERM', cancel);
}
