import { loadConfig } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { HttpPageFetcher } from "../lib/fetcher.js";
import { normalizeRunOptions } from "../lib/options.js";
import { loadSitesFile } from "../lib/sites.js";
import * as runRepository from "../repositories/run.repository.js";
import * as discoveredUrlRepository from "../repositories/discovered-url.repository.js";
import { processRun, type RunEnvironment } from "../processor.js";
import type { CreateRunDto, RunCreatedDto, RunResponseDto } from "../dto/run.dto.js";
import { toRunCreatedDto, toRunResponseDto } from "../dto/run.dto.js";
import type { Run } from "../db/schema.js";

const activeRuns = new Map<string, AbortController>();

export async function createRun(dto: CreateRunDto): Promise<RunCreatedDto> {
  const options = normalizeRunOptions(dto.options);

  const run = await runRepository.createRun({
    site: dto.site.trim().toLowerCase(),
    options,
  });

  console.log(`Run ${run.id} created for site ${run.site}`);

  // Processing continues in the background; failures end up on the run row.
  startProcessing(run).catch((error) => {
    console.error(`Run ${run.id}: could not record its outcome:`, error);
  });

  return toRunCreatedDto(run);
}

export async function getRun(id: string): Promise<RunResponseDto | undefined> {
  const run = await runRepository.findRunById(id);
  if (!run) return undefined;
  return toRunResponseDto(run);
}

export async function listRuns(limit?: number): Promise<RunResponseDto[]> {
  const runs = await runRepository.findRecentRuns(limit);
  return runs.map(toRunResponseDto);
}

/** Signals a live run to stop at its next page boundary. */
export function cancelRun(id: string): boolean {
  const controller = activeRuns.get(id);
  if (!controller) return false;
  controller.abort();
  console.log(`Run ${id}: cancellation requested`);
  return true;
}

export function cancelAllRuns(): void {
  for (const controller of activeRuns.values()) controller.abort();
}

export async function buildEnvironment(): Promise<RunEnvironment> {
  const config = loadConfig();
  const sites = await loadSitesFile(config.sitesFile);

  return {
    sites,
    createFetcher: (userAgent) =>
      new HttpPageFetcher({
        userAgent: userAgent ?? config.userAgent,
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.fetchMaxRetries,
        baseDelayMs: config.fetchBaseDelayMs,
      }),
    persistedUrls: discoveredUrlRepository.persistedUrlsFor,
    pageDelayMs: config.pageDelayMs,
    pageJitterMs: config.pageJitterMs,
  };
}

async function startProcessing(run: Run): Promise<void> {
  const controller = new AbortController();
  activeRuns.set(run.id, controller);

  try {
    let environment: RunEnvironment;
    try {
      environment = await buildEnvironment();
    } catch (error) {
      console.error(`Run ${run.id} failed before traversal:`, error);
      await runRepository.updateRun(run.id, {
        status: "failed",
        error: errorMessage(error),
        completedAt: new Date(),
      });
      return;
    }

    await processRun(
      {
        id: run.id,
        site: run.site,
        options: run.options,
      },
      environment,
      {
        onRunning: async () => {
          await runRepository.updateRun(run.id, { status: "running" });
        },
        onBatch: async (records) => {
          await discoveredUrlRepository.insertDiscovered(run.site, run.id, records);
        },
        onCompleted: async (report, cancelled) => {
          await runRepository.updateRun(run.id, {
            status: cancelled ? "cancelled" : "completed",
            report,
            completedAt: new Date(),
          });
        },
        onFailed: async (error) => {
          await runRepository.updateRun(run.id, {
            status: "failed",
            error,
            completedAt: new Date(),
          });
        },
      },
      controller.signal
    );
  } finally {
    activeRuns.delete(run.id);
  }
}
