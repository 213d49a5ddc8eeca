import { readFileSync } from "node:fs";
import { formatRegion, runDelegatePass } from "./delegate/index.ts";
import type { DelegateOptions } from "./delegate/options.ts";
import { DelegateError, type Diagnostic, formatDiagnostic, Severity } from "./errors/index.ts";
import { printLir } from "./lir/printer.ts";
import { readLir } from "./lir/reader/index.ts";
import { SourceFile } from "./utils/source.ts";

const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set(["--analyze", "--regions", "--emit", "--verbose", "--help", "--version"]);
const VALUE_FLAGS = ["--resolve=", "--invoke="];

// ─── Argument parsing ────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  printHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-V")) {
  console.log(`dxc ${VERSION}`);
  process.exit(0);
}

const filePath = args.find((a) => !a.startsWith("-"));

if (!filePath) {
  console.error("error: no input file provided\n");
  printHelp();
  process.exit(1);
}

const flags = new Set(args.filter((a) => a.startsWith("-")));

for (const flag of flags) {
  if (KNOWN_FLAGS.has(flag) || VALUE_FLAGS.some((prefix) => flag.startsWith(prefix))) continue;
  if (flag === "-h" || flag === "-V") continue;
  console.error(`error: unknown flag '${flag}'`);
  console.error("Run with --help to see available options.\n");
  process.exit(1);
}

function flagValue(prefix: string): string | undefined {
  const flag = args.find((a) => a.startsWith(prefix));
  return flag === undefined ? undefined : flag.slice(prefix.length);
}

const analyzeOnly = flags.has("--analyze");
const showRegions = flags.has("--regions") || analyzeOnly;
const emit = flags.has("--emit") || !showRegions;
const verbose = flags.has("--verbose");

function printHelp(): void {
  console.log(`dxc ${VERSION}: delegate extraction for LIR modules

Usage: dxc <file.lir> [options]

Options:
  --analyze          Grow regions and report them; do not rewrite
  --regions          Print a summary of every region
  --emit             Print the rewritten module (default)
  --verbose          Also print informational diagnostics
  --resolve=<name>   Extern used to find a pointer's owner
  --invoke=<name>    Extern used to run a unit remotely
  --help, -h         Show this help message
  --version, -V      Show the version

Examples:
  dxc worker.lir                  Print worker.lir after extraction
  dxc worker.lir --analyze        List the regions found in worker.lir`);
}

/** Print diagnostics; info ones only with --verbose. Returns the error count. */
function reportDiagnostics(diagnostics: readonly Diagnostic[], source: SourceFile): number {
  let errorCount = 0;
  for (const diag of diagnostics) {
    if (diag.severity === Severity.Info && !verbose) continue;
    console.error(formatDiagnostic(diag, source));
    if (diag.severity === Severity.Error) errorCount++;
  }
  return errorCount;
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

let content: string;
try {
  content = readFileSync(filePath, "utf8");
} catch {
  console.error(`error: could not read file '${filePath}'`);
  process.exit(1);
}

const source = new SourceFile(filePath, content);
const { module, diagnostics } = readLir(content, filePath);

const readErrors = reportDiagnostics(diagnostics, source);
if (readErrors > 0) {
  console.error(`\n${readErrors} error${readErrors !== 1 ? "s" : ""} emitted`);
  process.exit(1);
}

const options: DelegateOptions = { extract: !analyzeOnly };
const resolveName = flagValue("--resolve=");
const invokeName = flagValue("--invoke=");
if (resolveName) options.resolveLocation = resolveName;
if (invokeName) options.invokeRemote = invokeName;

try {
  const result = runDelegatePass(module, options);
  reportDiagnostics(result.diagnostics, source);

  if (showRegions) {
    for (const region of result.regions) console.log(formatRegion(region));
    for (const anchor of result.stackAnchors) {
      console.log(`stack anchor in ${anchor.function}: ${anchor.node} (base ${anchor.base})`);
    }
  }
  if (emit && !analyzeOnly) {
    process.stdout.write(printLir(result.module));
  }
} catch (err) {
  if (!(err instanceof DelegateError)) throw err;
  console.error(`${filePath}: error: [${err.code}] ${err.message}`);
  process.exit(1);
}
