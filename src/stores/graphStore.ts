import { z } from "zod";
import { fetchJson } from "../utils";

export type GraphQueryKind = "node_lookup" | "entity_centric" | "multi_hop" | "cross_source" | "node_sample";

/** A parameterized Cypher statement. Values are always bound, never spliced. */
export interface GraphQuery {
  kind: GraphQueryKind;
  text: string;
  params: Record<string, unknown>;
}

export type GraphRow = Record<string, unknown>;

export interface GraphStore {
  run(query: GraphQuery): Promise<GraphRow[]>;
}

const TransactionResponseSchema = z.object({
  results: z.array(
    z.object({
      columns: z.array(z.string()),
      data: z.array(z.object({ row: z.array(z.unknown()) }))
    })
  ),
  errors: z.array(z.object({ code: z.string(), message: z.string() })).default([])
});

export class GraphQueryError extends Error {
  constructor(readonly code: string, message: string) {
    super(`${code}: ${message}`);
    this.name = "GraphQueryError";
  }
}

export function rowsFromTransactionResponse(data: unknown): GraphRow[] {
  const parsed = TransactionResponseSchema.parse(data);
  const [firstError] = parsed.errors;
  if (firstError) {
    throw new GraphQueryError(firstError.code, firstError.message);
  }
  return parsed.results.flatMap(({ columns, data: rows }) =>
    rows.map(({ row }) => Object.fromEntries(columns.map((column, index) => [column, row[index] ?? null])))
  );
}

export interface Neo4jHttpGraphStoreOptions {
  baseUrl: string;
  database: string;
  user: string;
  password?: string;
  timeoutMs?: number;
}

/** Runs statements through the Neo4j HTTP transactional endpoint in auto-commit mode. */
export class Neo4jHttpGraphStore implements GraphStore {
  constructor(private readonly options: Neo4jHttpGraphStoreOptions) {}

  async run(query: GraphQuery): Promise<GraphRow[]> {
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/db/${encodeURIComponent(this.options.database)}/tx/commit`;
    const data = await fetchJson(
      url,
      {
        method: "POST",
        timeout: this.options.timeoutMs ?? 8_000,
        auth: this.options.password ? { username: this.options.user, password: this.options.password } : undefined,
        headers: { Accept: "application/json;charset=UTF-8" },
        data: { statements: [{ statement: query.text, parameters: query.params }] }
      },
      { retries: 1, initialDelayMs: 200 }
    );
    return rowsFromTransactionResponse(data);
  }
}
