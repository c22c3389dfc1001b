export interface ParsedFlags {
  /** Dataset path, run directory, or "latest" */
  continueFrom?: string;
  workers?: number;
  flushEvery?: number;
  format?: string;
  limit?: number;
  verbose: boolean;
  help: boolean;
}

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--continue":
      case "-c":
        // Bare flag continues the latest run
        if (next !== undefined && !next.startsWith("-")) {
          flags.continueFrom = next;
          i++;
        } else {
          flags.continueFrom = "latest";
        }
        break;
      case "--workers":
      case "-w":
        flags.workers = parseInt(next || "", 10);
        i++;
        break;
      case "--flush":
      case "-f":
        flags.flushEvery = parseInt(next || "", 10);
        i++;
        break;
      case "--format":
        flags.format = next;
        i++;
        break;
      case "--limit":
      case "-l":
        flags.limit = parseInt(next || "", 10);
        i++;
        break;
      case "--verbose":
      case "-v":
        flags.verbose = true;
        break;
      case "--help":
      case "-h":
        flags.help = true;
        break;
    }
  }

  return flags;
}
