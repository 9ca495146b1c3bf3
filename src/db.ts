import { Pool, QueryResultRow } from "pg";
import { config } from "./config";
import { Queryable } from "./repositories/jobRepository";

export const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  user: config.database.user,
  password: config.database.password,
  database: config.database.database,
});

export const db: Queryable = {
  query: <R extends QueryResultRow>(text: string, values: unknown[] = []) =>
    pool.query<R>(text, values),
};
