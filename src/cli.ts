import { Command, CommanderError } from "commander";
import { formatKeywords, type Printer } from "./engine/formatKeywords.js";

export type CliIO = {
  print: Printer;
  error: (...data: unknown[]) => void;
  exit: (code: number) => void;
};

export function createProgram(print: Printer = console.log): Command {
  const program = new Command();

  program
    .name("keyword-formatter")
    .description("Format two word lists as primary/secondary keyword declarations")
    .version("1.0.0")
    .argument("<primary>", "path to the primary word list")
    .argument("<secondary>", "path to the secondary word list")
    .action((primary: string, secondary: string) => {
      formatKeywords(primary, secondary, print);
    });

  return program;
}

export function main(argv: string[], io: Partial<CliIO> = {}): void {
  const {
    print = console.log,
    error = console.error,
    exit = (code: number) => process.exit(code)
  } = io;

  const program = createProgram(print)
    .exitOverride()
    .configureOutput({ writeErr: str => error(str.trimEnd()) });

  try {
    program.parse(argv);
  } catch (e) {
    // commander has already reported its own errors
    if (e instanceof CommanderError) {
      exit(e.exitCode);
      return;
    }
    error("Error:", e instanceof Error ? e.message : String(e));
    exit(1);
  }
}
