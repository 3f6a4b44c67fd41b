export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type Reporter = {
  info(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
  error(code: string, message: string, details?: Record<string, unknown>): void;
  /** Stage header; human output only. */
  section(title: string): void;
};

type Sink = { write(chunk: string): unknown };

const COLORS = {
  info: "\u001b[92m",
  warn: "\u001b[93m",
  error: "\u001b[91m",
  section: "\u001b[94m",
  reset: "\u001b[0m",
} as const;

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Diagnostic {
  return details ? { level, code, message, details } : { level, code, message };
}

/**
 * Console reporter. `jsonl` writes one Diagnostic per line on stdout; `human`
 * writes tagged lines, errors to stderr.
 */
export function createReporter(
  format: OutputFormat,
  streams: { out: Sink; err: Sink } = { out: process.stdout, err: process.stderr },
  color = format === "human" && process.stdout.isTTY === true,
): Reporter {
  const paint = (key: keyof typeof COLORS, text: string) => (color ? `${COLORS[key]}${text}${COLORS.reset}` : text);

  const emit = (d: Diagnostic) => {
    if (format === "jsonl") {
      streams.out.write(JSON.stringify(d) + "\n");
      return;
    }
    const tag = paint(d.level, `[${d.level.toUpperCase()}]`);
    const sink = d.level === "error" ? streams.err : streams.out;
    sink.write(`${tag} ${d.message}\n`);
    const detail = d.details?.detail;
    if (typeof detail === "string" && detail.length > 0) {
      sink.write(detail.endsWith("\n") ? detail : detail + "\n");
    }
  };

  return {
    info: (code, message, details) => emit(diag("info", code, message, details)),
    warn: (code, message, details) => emit(diag("warn", code, message, details)),
    error: (code, message, details) => emit(diag("error", code, message, details)),
    section: (title) => {
      if (format !== "human") return;
      const rule = "=".repeat(60);
      streams.out.write(`\n${paint("section", rule)}\n${paint("section", `  ${title}`)}\n${paint("section", rule)}\n\n`);
    },
  };
}

/** Reporter that keeps diagnostics in memory. */
export class MemoryReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];
  readonly sections: string[] = [];

  info(code: string, message: string, details?: Record<string, unknown>): void {
    this.diagnostics.push(diag("info", code, message, details));
  }

  warn(code: string, message: string, details?: Record<string, unknown>): void {
    this.diagnostics.push(diag("warn", code, message, details));
  }

  error(code: string, message: string, details?: Record<string, unknown>): void {
    this.diagnostics.push(diag("error", code, message, details));
  }

  section(title: string): void {
    this.sections.push(title);
  }

  codes(level?: Diagnostic["level"]): string[] {
    return this.diagnostics.filter((d) => !level || d.level === level).map((d) => d.code);
  }
}
