import { Console } from "node:console";
import * as fs from "node:fs/promises";
import { buffer } from "node:stream/consumers";
import { run } from "./cli.js";

async function readVersion(): Promise<string> {
  const text = await fs.readFile(
    new URL("../package.json", import.meta.url),
    "utf8",
  );
  const pkg: unknown = JSON.parse(text);
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "unknown";
}

async function readInput(file: string | undefined): Promise<Uint8Array> {
  const data =
    file === undefined ? await buffer(process.stdin) : await fs.readFile(file);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

async function main(): Promise<void> {
  const code = await run(process.argv.slice(2), {
    version: await readVersion(),
    // stdout carries the JSON; logs go to stderr
    logger: new Console({ stdout: process.stderr, stderr: process.stderr }),
    readInput,
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  });
  process.exitCode = code;
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
