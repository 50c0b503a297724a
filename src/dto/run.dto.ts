import type { NormalizedRunOptions } from "../lib/options.js";
import type { RunOptions } from "../lib/types.js";
import type { Run, RunReport, RunStatus } from "../db/schema.js";

export interface CreateRunDto {
  site: string;
  options?: RunOptions;
}

export interface RunResponseDto {
  id: string;
  site: string;
  status: RunStatus;
  options: NormalizedRunOptions;
  report?: RunReport;
  error?: string;
  createdAt: string;
  completedAt?: string;
}

export interface RunCreatedDto {
  id: string;
  status: RunStatus;
}

export function toRunResponseDto(run: Run): RunResponseDto {
  return {
    id: run.id,
    site: run.site,
    status: run.status,
    options: run.options,
    report: run.report ?? undefined,
    error: run.error ?? undefined,
    createdAt: run.createdAt.toISOString(),
    completedAt: run.completedAt?.toISOString(),
  };
}

export function toRunCreatedDto(run: Run): RunCreatedDto {
  return {
    id: run.id,
    status: run.status,
  };
}
