import fs from "node:fs";
import path from "node:path";

type StepPhase = "start" | "end" | "error" | "info";

export type StepRecord = {
  ts: string;
  step: string;
  phase: StepPhase;
  ms?: number;
  path?: string;
  error_code?: string;
  error_message?: string;
  data?: Record<string, unknown>;
};

export type RunMeta = {
  status: "running" | "success" | "error";
  started_at: string;
  ended_at: string;
  duration_ms: number;
  logs_dir: string;
  steps_log_path: string;
  counts?: Record<string, number>;
  error_code?: string;
  error_message?: string;
};

export class StepLogger {
  readonly logsDir: string;
  readonly stepsPath: string;
  readonly metaPath: string;
  private readonly startedAt: number;
  private readonly startedAtIso: string;
  private finalized = false;
  private lastMeta: RunMeta | null = null;

  constructor(logsDir: string) {
    this.logsDir = logsDir;
    this.stepsPath = path.join(logsDir, "steps.jsonl");
    this.metaPath = path.join(logsDir, "run_meta.json");
    fs.mkdirSync(this.logsDir, { recursive: true });
    fs.writeFileSync(this.stepsPath, "");
    this.startedAt = Date.now();
    this.startedAtIso = new Date(this.startedAt).toISOString();
    this.writeMeta({
      status: "running",
      started_at: this.startedAtIso,
      ended_at: this.startedAtIso,
      duration_ms: 0,
      logs_dir: this.logsDir,
      steps_log_path: this.stepsPath
    });
  }

  log(record: StepRecord): void {
    const line = JSON.stringify(record);
    fs.appendFileSync(this.stepsPath, `${line}\n`);
  }

  info(step: string, data?: Record<string, unknown>, target?: string): void {
    this.log({ ts: new Date().toISOString(), step, phase: "info", path: target, data });
  }

  failure(step: string, err: unknown, target?: string): void {
    const { code, message } = normalizeError(err);
    this.log({
      ts: new Date().toISOString(),
      step,
      phase: "error",
      path: target,
      error_code: code,
      error_message: message
    });
  }

  async step<T>(name: string, fn: () => Promise<T>, target?: string): Promise<T> {
    const started = Date.now();
    this.log({ ts: new Date(started).toISOString(), step: name, phase: "start", path: target });
    try {
      const result = await fn();
      const ended = Date.now();
      this.log({
        ts: new Date(ended).toISOString(),
        step: name,
        phase: "end",
        ms: ended - started,
        path: target
      });
      return result;
    } catch (err) {
      const ended = Date.now();
      const { code, message } = normalizeError(err);
      this.log({
        ts: new Date(ended).toISOString(),
        step: name,
        phase: "error",
        ms: ended - started,
        path: target,
        error_code: code,
        error_message: message
      });
      throw err;
    }
  }

  finalize(status: "success" | "error", err?: unknown, counts?: Record<string, number>): RunMeta {
    if (this.finalized && this.lastMeta) {
      return this.lastMeta;
    }
    const ended = Date.now();
    const meta: RunMeta = {
      status,
      started_at: this.startedAtIso,
      ended_at: new Date(ended).toISOString(),
      duration_ms: ended - this.startedAt,
      logs_dir: this.logsDir,
      steps_log_path: this.stepsPath,
      counts
    };
    if (err) {
      const { code, message } = normalizeError(err);
      meta.error_code = code;
      meta.error_message = message;
    }
    this.writeMeta(meta);
    this.finalized = true;
    this.lastMeta = meta;
    return meta;
  }

  private writeMeta(meta: RunMeta): void {
    fs.writeFileSync(this.metaPath, `${JSON.stringify(meta, null, 2)}\n`);
  }
}

export function normalizeError(err: unknown): { code: string; message: string } {
  if (err && typeof err === "object") {
    const code = "code" in err && typeof err.code === "string" ? err.code : "name" in err && typeof err.name === "string" ? err.name : "ERROR";
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    return { code, message };
  }
  return { code: "ERROR", message: String(err) };
}
