import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";

// Run logging system
export type LogStage = "classify" | "fetch" | "parse" | "emit" | "manifest";
export type LogLevel = "info" | "warn" | "error";

interface RunLogEntry {
  timestamp: string;
  stage: LogStage;
  level: LogLevel;
  message: string;
  details?: Record<string, unknown>;
}

interface RunLog {
  command?: string;
  startTime: string;
  endTime?: string;
  summary: {
    totalWarnings: number;
    totalErrors: number;
    stageIssues: Record<LogStage, number>;
  };
  entries: RunLogEntry[];
}

function emptyRunLog(command?: string): RunLog {
  return {
    command,
    startTime: new Date().toISOString(),
    summary: {
      totalWarnings: 0,
      totalErrors: 0,
      stageIssues: { classify: 0, fetch: 0, parse: 0, emit: 0, manifest: 0 },
    },
    entries: [],
  };
}

export let runLog: RunLog = emptyRunLog();

export function resetRunLog(command?: string) {
  runLog = emptyRunLog(command);
}

export function logEntry(stage: LogStage, level: LogLevel, message: string, details?: Record<string, unknown>) {
  runLog.entries.push({
    timestamp: new Date().toISOString(),
    stage,
    level,
    message,
    details,
  });

  if (level === "info") {
    console.log(message);
    return;
  }

  if (level === "warn") {
    runLog.summary.totalWarnings++;
    console.warn(` ⚠ ${message}`);
  } else {
    runLog.summary.totalErrors++;
    console.error(` ! ${message}`);
  }
  runLog.summary.stageIssues[stage]++;
}

export function warningsFor(stage: LogStage): string[] {
  return runLog.entries.filter((entry) => entry.stage === stage && entry.level === "warn").map((entry) => entry.message);
}

export async function saveRunLog(path: string) {
  runLog.endTime = new Date().toISOString();
  const logFile = resolve(path);
  await mkdir(dirname(logFile), { recursive: true });
  await writeFile(logFile, JSON.stringify(runLog, null, 2), "utf-8");
  console.log(`Run log saved to ${logFile}`);
}
