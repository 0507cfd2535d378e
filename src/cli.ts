import { pathToFileURL } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import type { RuntimeConfig } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import { nextFireTime, parseSchedule, previewSamples } from "./scheduler/expression.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface PreviewArgs {
  hour: string;
  minute: string;
  second: string | null;
}

export interface ParsedArgs {
  daemon: boolean;
  subjects: string | null;
  preview: PreviewArgs | null;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    daemon: false,
    subjects: null,
    preview: null,
    help: false,
  };

  const operand = (index: number): string | null => {
    const value = argv[index];
    return value !== undefined && !value.startsWith("--") ? value : null;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--daemon") {
      result.daemon = true;
      i++;
    } else if (arg === "--subjects") {
      const value = operand(i + 1);
      if (value === null) {
        throw new Error("--subjects requires a file path argument");
      }
      result.subjects = value;
      i += 2;
    } else if (arg === "--preview") {
      const hour = operand(i + 1);
      const minute = operand(i + 2);
      if (hour === null || minute === null) {
        throw new Error("--preview requires <hour> and <minute> expressions");
      }
      const second = operand(i + 3);
      result.preview = { hour, minute, second };
      i += second === null ? 3 : 4;
    } else {
      throw new Error(`Unknown argument: ${String(arg)}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
lapse-scheduler: timelapse capture and export scheduler

Usage:
  lapse-scheduler --daemon [--subjects <file>]      Run the scheduler until stopped
  lapse-scheduler --preview <hour> <minute> [sec]   Show when a cron schedule fires

Options:
  --subjects <file>   Subjects YAML file (default: $SUBJECTS_FILE or ./subjects.yaml)
  --help, -h          Show this help message

Examples:
  lapse-scheduler --daemon --subjects ./subjects.yaml
  lapse-scheduler --preview "6-20" "*/15"
  lapse-scheduler --preview "22-23,0-2" "0" "*/30"
`.trim();

// ── Preview ────────────────────────────────────────────────────────────────

/**
 * Render a schedule preview: sample times from the start of the day and the
 * next fire times after `now`.
 */
export function formatPreview(
  preview: PreviewArgs,
  now: Date = new Date(),
  count: number = 5,
): string {
  const expr = parseSchedule({
    id: "preview",
    hour: preview.hour,
    minute: preview.minute,
    second: preview.second ?? undefined,
  });

  const lines = [`Samples: ${previewSamples(expr, count).join(", ")}`, "Next runs:"];
  let after = now;
  for (let n = 0; n < count; n++) {
    const next = nextFireTime(expr, after);
    if (!next) break;
    lines.push(`  ${next.toLocaleString()}`);
    after = next;
  }
  return lines.join("\n");
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  // Parse arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  // Help mode
  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  // ── Preview Mode ───────────────────────────────────────────────────────
  if (args.preview) {
    try {
      console.log(formatPreview(args.preview));
    } catch (err: unknown) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
      return;
    }
    process.exit(0);
    return;
  }

  if (!args.daemon) {
    console.error("Error: Provide --daemon or --preview");
    console.error(HELP_TEXT);
    process.exit(1);
    return;
  }

  // Load config
  let config: RuntimeConfig;
  try {
    config = loadConfig(args.subjects ? { SUBJECTS_FILE: args.subjects } : undefined);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    process.exit(1);
    return;
  }

  // ── Daemon Mode ────────────────────────────────────────────────────────
  const app = await bootstrap(config);
  app.start();
  app.logger.info("daemon_running", { subjects: app.scheduler.getSubjects().length });
  // The tick timer keeps the event loop alive until a signal arrives.
}

// Only run main when executed directly, not when imported by tests
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error("Fatal error:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
