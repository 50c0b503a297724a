import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { loadConfig } from "../lib/config.js";
import * as schema from "./schema.js";

const client = postgres(loadConfig().databaseUrl);

export const db = drizzle(client, { schema });

export async function closeDb(): Promise<void> {
  await client.end({ timeout: 5 });
}

export { schema };
