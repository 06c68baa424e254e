import {
  IngestFatalError,
  type IngestErrorContext
} from "../application/ingest-comments/ingest.error-handler";
import type { IngestRunSummary } from "../application/ingest-comments/ingestComments.usecase";
import { runIngest } from "../composition/root";

/**
 * 0: the range was walked to its end or the archive ran dry.
 * 1: the run failed.
 * 2: the run stopped early because the archive kept failing; re-run to resume.
 */
export const exitCodes = {
  ok: 0,
  failed: 1,
  incomplete: 2
} as const;

type CliErrorEnvelope = {
  event: "ingest.failed";
  name: string;
  message: string;
  code?: string;
  context?: IngestErrorContext;
  stack?: string;
};

type CliIncompleteNotice = {
  event: "ingest.incomplete";
  outcome: IngestRunSummary["outcome"];
  cursorDate: string;
  gaps: number;
};

const numericContext = (context: IngestErrorContext): IngestErrorContext | undefined => {
  const kept = Object.fromEntries(
    Object.entries(context).filter(([, value]) => typeof value === "number" && Number.isFinite(value))
  );
  return Object.keys(kept).length > 0 ? kept : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

// Never carries `cause`: it may hold raw archive payloads or driver internals.
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: CliErrorEnvelope = {
    event: "ingest.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (err instanceof IngestFatalError) {
    envelope.code = err.code;
    const context = numericContext(err.context);
    if (context) envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }
  return envelope;
};

export const exitCodeFor = (summary: Pick<IngestRunSummary, "outcome">): number =>
  summary.outcome === "source_unavailable" ? exitCodes.incomplete : exitCodes.ok;

export const executeIngestCli = async (): Promise<void> => {
  let summary: IngestRunSummary;
  try {
    summary = await runIngest();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
    process.exit(exitCodes.failed);
  }

  const code = exitCodeFor(summary);
  if (code !== exitCodes.ok) {
    const notice: CliIncompleteNotice = {
      event: "ingest.incomplete",
      outcome: summary.outcome,
      cursorDate: summary.cursorDate,
      gaps: summary.gaps
    };
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(notice));
    process.exit(code);
  }
};

if (require.main === module) {
  void executeIngestCli();
}
