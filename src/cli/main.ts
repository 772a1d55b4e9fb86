import { run } from "./cli";
import { createNodeContext, createNodeFileSystem } from "#/node";

process.exitCode = run(process.argv.slice(2), {
  cwd: process.cwd(),
  fs: createNodeFileSystem(),
  createContext: createNodeContext,
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
});
