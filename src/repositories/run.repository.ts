import { desc, eq } from "drizzle-orm";
import { db } from "../db/index.js";
import { runs, type Run, type NewRun, type RunStatus, type RunReport } from "../db/schema.js";

export interface RunUpdateData {
  status?: RunStatus;
  report?: RunReport;
  error?: string;
  completedAt?: Date;
}

export async function createRun(data: NewRun): Promise<Run> {
  const [run] = await db.insert(runs).values(data).returning();
  return run;
}

export async function findRunById(id: string): Promise<Run | undefined> {
  const [run] = await db.select().from(runs).where(eq(runs.id, id)).limit(1);
  return run;
}

export async function findRecentRuns(limit = 20): Promise<Run[]> {
  return db.select().from(runs).orderBy(desc(runs.createdAt)).limit(limit);
}

export async function updateRun(
  id: string,
  data: RunUpdateData
): Promise<Run | undefined> {
  const [run] = await db
    .update(runs)
    .set(data)
    .where(eq(runs.id, id))
    .returning();
  return run;
}
