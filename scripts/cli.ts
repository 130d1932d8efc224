import { config } from "dotenv";
import * as path from "path";

// Load .env from project root before anything reads DATABASE_URL
config({ path: path.resolve(__dirname, "..", ".env") });

export type ParsedArgs = {
  positional: string[];
  flags: Map<string, string | true>;
};

/** `--key value`, `--key=value` and bare `--flag` forms. */
export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq >= 0) {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.set(body, next);
      i += 1;
    } else {
      flags.set(body, true);
    }
  }

  return { positional, flags };
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

export function runScript(main: () => Promise<void>): void {
  main()
    .then(async () => {
      const { closePool } = await import("../lib/db");
      await closePool();
    })
    .catch(async (error: unknown) => {
      console.error(error instanceof Error ? `Error: ${error.message}` : error);
      const { closePool } = await import("../lib/db");
      await closePool();
      process.exit(1);
    });
}
