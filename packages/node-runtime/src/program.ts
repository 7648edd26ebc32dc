// packages/node-runtime/src/program.ts
import { Command, CommanderError, Option } from 'commander';
import { VariantRegistry, toVerbosity } from '../../core/src/index.js';
import { convertFile } from './index.js';

const PKG_VERSION = '0.1.0'; // sync with root package.json

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

interface CliOptions {
  variant: string;
  verbose: number;
}

const processIo: CliIo = {
  stdout: text => { process.stdout.write(text); },
  stderr: text => { process.stderr.write(text); },
};

const HELP_AFTER = `
Supported input types:
  .lua   Lua script (OS 3.0.2+)
  .py    Python script (CX II OS 5.2+)
  other  plain text note with LaTeX math notation

Examples:
  $ tnspack script.lua output.tns
  $ tnspack solver.py solver.tns
  $ tnspack notes.txt notes.tns

LaTeX math notation:
  Greek         \\alpha, \\beta, \\gamma  → α, β, γ
  Superscripts  x^2, x^{10}            → x², x¹⁰
  Subscripts    H_2O                   → H₂O
  Operators     \\pm, \\times, \\leq      → ±, ×, ≤
  Fractions     \\frac12, \\frac34       → ½, ¾
`;

function describeVariants(): string {
  return VariantRegistry.ids()
    .map(id => `${id}: ${VariantRegistry.get(id).description}`)
    .join('; ');
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return `Error [${err.constructor.name}]: ${err.message}\n`;
  return `Error [Unknown]: ${String(err)}\n`;
}

/**
 * Build the `tnspack` command. `setExit` receives the exit code of a run
 * that finished without throwing.
 */
export function createProgram(io: CliIo, setExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('tnspack')
    .version(PKG_VERSION, '--version')
    .description('Convert Lua scripts, Python scripts and text notes into TI-Nspire .tns documents')
    .argument('[input]', 'source file (.lua, .py or text)')
    .argument('[output]', 'destination .tns file')
    .addOption(
      new Option('-V, --variant <id>', `archive format variant (${describeVariants()})`)
        .choices(VariantRegistry.ids())
        .default(VariantRegistry.current.id),
    )
    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_value: string, previous: number) => previous + 1),
    )
    .addHelpText('after', HELP_AFTER)
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    })
    .action(async (input: string | undefined, output: string | undefined, opts: CliOptions) => {
      if (input === undefined || output === undefined) {
        program.outputHelp({ error: true });
        setExit(1);
        return;
      }

      await convertFile(input, output, {
        variant: opts.variant,
        verbose: toVerbosity(opts.verbose),
        logger : msg => io.stderr(`${msg}\n`),
      });
      io.stdout(`Created ${output}\n`);
      setExit(0);
    });

  return program;
}

/** Run the CLI over user arguments (no `node` / script prefix); resolves to the exit code. */
export async function runCli(args: readonly string[], io: CliIo = processIo): Promise<number> {
  let code = 0;
  const program = createProgram(io, c => { code = c; });

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (err) {
    // help, version and usage errors were already printed by commander
    if (err instanceof CommanderError) return err.exitCode;
    io.stderr(formatError(err));
    return 1;
  }
  return code;
}
