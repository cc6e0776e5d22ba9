import { Pool } from "pg";

export interface DatabaseConfig {
  readonly databaseUrl: string;
}

/** The part of a pg client the stores use. */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/** One pool per process; the CLI opens it per command and closes it when done. */
export class DatabaseClient implements SqlExecutor {
  private readonly pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      connectionString: config.databaseUrl,
      application_name: "subreddit-sampler",
    });
  }

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    const result = await this.pool.query(text, values);
    return { rows: result.rows };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
