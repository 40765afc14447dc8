import { PoolClient, QueryResult, QueryResultRow } from "pg";
import { Metrics } from "../../../shared/observability/metrics";

export type DbMetrics = Pick<Metrics, "recordDbQuery">;

export const timedQuery = async <R extends QueryResultRow>(
  client: PoolClient,
  metrics: DbMetrics,
  query: string,
  params: unknown[],
  operation: string
): Promise<QueryResult<R>> => {
  const start = process.hrtime.bigint();
  try {
    return await client.query<R>(query, params);
  } finally {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
    metrics.recordDbQuery("postgres", operation, durationSeconds);
  }
};
