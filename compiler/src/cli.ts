import { spawnSync } from "node:child_process";
import { readFileSync, writeFileSync } from "node:fs";
import type { SExpr } from "./ast/nodes.ts";
import { compileSource, parseSource } from "./compiler.ts";
import { countErrors, type Diagnostic, formatDiagnostic } from "./errors/index.ts";
import { printIr } from "./ir/index.ts";
import { SourceFile } from "./utils/source.ts";

const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set([
  "--tokens",
  "--ast",
  "--ir",
  "--emit-asm",
  "--build",
  "--run",
  "--help",
  "--version",
  "-h",
  "-V",
  "-o",
]);

// ─── Argument parsing ────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  printHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-V")) {
  console.log(`scrawl ${VERSION}`);
  process.exit(0);
}

let outputPath: string | null = null;
const positional: string[] = [];
const flags = new Set<string>();

for (let idx = 0; idx < args.length; idx++) {
  const arg = args[idx] ?? "";
  if (!arg.startsWith("-")) {
    positional.push(arg);
    continue;
  }
  if (!KNOWN_FLAGS.has(arg)) {
    console.error(`error: unknown flag '${arg}'`);
    console.error("Run with --help to see available options.\n");
    process.exit(1);
  }
  if (arg === "-o") {
    const value = args[idx + 1];
    if (value === undefined) {
      console.error("error: '-o' expects a file name");
      process.exit(1);
    }
    outputPath = value;
    idx++;
    continue;
  }
  flags.add(arg);
}

const filePath = positional[0];

if (filePath === undefined) {
  console.error("error: no input file provided\n");
  printHelp();
  process.exit(1);
}

const showAst = flags.has("--ast");
const showIr = flags.has("--ir");
const emitAsmFlag = flags.has("--emit-asm");
const buildFlag = flags.has("--build");
const runFlag = flags.has("--run");

// ─── Reporting helpers ───────────────────────────────────────────────────────

/** Print all diagnostics with source context. Returns the error count. */
function reportDiagnostics(diagnostics: readonly Diagnostic[], source: SourceFile): number {
  for (const diag of diagnostics) {
    console.error(formatDiagnostic(diag, source));
  }
  return countErrors(diagnostics);
}

function failWithDiagnostics(diagnostics: readonly Diagnostic[], source: SourceFile): never {
  const n = reportDiagnostics(diagnostics, source);
  console.error(`\n${n} error${n !== 1 ? "s" : ""} emitted`);
  process.exit(1);
}

function printHelp(): void {
  console.log(`scrawl ${VERSION} — compiles scrawl programs to x86-64 assembly

Usage: scrawl <file.scrawl> [options]

Options:
  --tokens       Print the tokens (the default)
  --ast          Print the syntax tree
  --ir           Print the IR
  --emit-asm     Print the generated NASM assembly
  -o <file>      Write --emit-asm output, or the --build binary, to <file>
  --build        Assemble with nasm and link into a native binary
  --run          Build and run the program
  --help, -h     Show this help message
  --version, -V  Show the compiler version

Examples:
  scrawl hello.scrawl --run             Compile and run hello.scrawl
  scrawl hello.scrawl --build -o hello  Compile hello.scrawl to ./hello
  scrawl hello.scrawl --emit-asm        Print the assembly`);
}

/** First of `candidates` found on PATH. */
function findTool(candidates: readonly string[]): string | null {
  for (const tool of candidates) {
    const which = spawnSync("which", [tool]);
    if (which.status === 0) return tool;
  }
  return null;
}

function runTool(cmd: string, toolArgs: readonly string[], what: string): void {
  const result = spawnSync(cmd, toolArgs, { encoding: "utf8" });
  if (result.error !== undefined) {
    console.error(`error: could not run ${cmd}: ${result.error.message}`);
    process.exit(1);
  }
  if (result.status !== 0) {
    console.error(`error: ${what} failed:\n${result.stderr}`);
    process.exit(1);
  }
}

// ─── AST printer ─────────────────────────────────────────────────────────────

function printAst(expr: SExpr, indent: number): void {
  const prefix = "  ".repeat(indent);
  switch (expr.kind) {
    case "NumberLit":
    case "BoolLit":
      console.log(`${prefix}${expr.kind} ${String(expr.value)}`);
      return;
    case "StringLit":
      console.log(`${prefix}StringLit ${JSON.stringify(expr.value)}`);
      return;
    case "Symbol":
      console.log(`${prefix}Symbol ${expr.name}`);
      return;
    case "Form":
      console.log(`${prefix}Form`);
      printAst(expr.head, indent + 1);
      for (const arg of expr.args) {
        printAst(arg, indent + 1);
      }
      return;
  }
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

if (emitAsmFlag || buildFlag || runFlag || showIr) {
  const result = compileSource(source);
  if (countErrors(result.diagnostics) > 0) {
    failWithDiagnostics(result.diagnostics, source);
  }
  reportDiagnostics(result.diagnostics, source);

  if (showIr && result.ir !== null) {
    console.log(printIr(result.ir));
  }

  const assembly = result.assembly ?? "";
  if (emitAsmFlag) {
    if (outputPath !== null && !buildFlag && !runFlag) {
      writeFileSync(outputPath, assembly);
    } else {
      process.stdout.write(assembly);
    }
  }

  if (buildFlag || runFlag) {
    const outBase = filePath.replace(/\.scrawl$/, "");
    const binPath = outputPath ?? outBase;
    const asmPath = `${outBase}.asm`;
    const objPath = `${outBase}.o`;
    writeFileSync(asmPath, assembly);

    if (findTool(["nasm"]) === null) {
      console.error("error: nasm not found on PATH");
      process.exit(1);
    }
    const linker = findTool(["cc", "gcc", "clang"]);
    if (linker === null) {
      console.error("error: no C compiler found (tried cc, gcc, clang)");
      process.exit(1);
    }

    runTool("nasm", ["-felf64", "-o", objPath, asmPath], "assembling");
    runTool(linker, ["-o", binPath, objPath, "-lm"], "linking");

    if (buildFlag) {
      console.log(`Compiled: ${binPath}`);
    }

    if (runFlag) {
      const run = spawnSync(binPath.includes("/") ? binPath : `./${binPath}`, [], { stdio: "inherit" });
      process.exit(run.status ?? 1);
    }
  }
} else {
  const { tokens, program, diagnostics } = parseSource(source);
  const errorCount = reportDiagnostics(diagnostics, source);

  if (showAst) {
    if (errorCount > 0) {
      console.error(`\n${errorCount} error${errorCount !== 1 ? "s" : ""} emitted`);
      process.exit(1);
    }
    console.log("Program");
    for (const form of program.forms) {
      printAst(form, 1);
    }
  } else {
    for (const token of tokens) {
      console.log(`${token.kind}\t${token.lexeme}\t${token.line}:${token.column}`);
    }
  }
}
