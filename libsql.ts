/**
 * libSQL (sqld) HTTP client for agent-recall
 * Uses the server's statement API directly (no SDK dependency)
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { MemoryError, describeError } from "./errors.js";

export type StatementValue = string | number | null;

export interface Statement {
  q: string;
  params?: StatementValue[];
}

export type StatementResult =
  | { kind: "rows"; columns: string[]; rows: unknown[][] }
  | { kind: "error"; message: string };

export interface ExecuteOptions {
  /** Overrides the client's request timeout */
  timeoutMs?: number;
}

export interface StatementExecutor {
  /** One result per statement, in order. No cross-statement atomicity. */
  execute(statements: Statement[], options?: ExecuteOptions): Promise<StatementResult[]>;
}

const RowsEntry = Type.Object({
  results: Type.Object({
    columns: Type.Optional(Type.Array(Type.String())),
    rows: Type.Array(Type.Array(Type.Unknown())),
  }),
});

const ErrorEntry = Type.Object({
  error: Type.Union([Type.String(), Type.Object({ message: Type.String() })]),
});

const ResponseBody = Type.Array(Type.Union([RowsEntry, ErrorEntry]));

type ResponseEntry = Static<typeof RowsEntry> | Static<typeof ErrorEntry>;

function toResult(entry: ResponseEntry): StatementResult {
  if ("error" in entry) {
    return {
      kind: "error",
      message: typeof entry.error === "string" ? entry.error : entry.error.message,
    };
  }
  return { kind: "rows", columns: entry.results.columns ?? [], rows: entry.results.rows };
}

export class LibsqlHttpClient implements StatementExecutor {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(url: string, timeoutMs: number, authToken?: string) {
    this.url = url.replace(/\/$/, "");
    this.timeoutMs = timeoutMs;
    this.headers = {
      "Content-Type": "application/json",
      ...(authToken ? { Authorization: `Bearer ${authToken}` } : {}),
    };
  }

  async execute(statements: Statement[], options: ExecuteOptions = {}): Promise<StatementResult[]> {
    let res: Response;
    try {
      res = await fetch(`${this.url}/`, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify({ statements }),
        signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs),
      });
    } catch (err) {
      throw new MemoryError("StoreUnavailable", `Store request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      throw new MemoryError("StoreUnavailable", `Store responded ${res.status}: ${await res.text()}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new MemoryError("StoreProtocolError", "Store response was not valid JSON", { cause: err });
    }

    if (!Value.Check(ResponseBody, body)) {
      throw new MemoryError("StoreProtocolError", "Store response did not match the statement result shape");
    }
    if (body.length !== statements.length) {
      throw new MemoryError(
        "StoreProtocolError",
        `Store returned ${body.length} results for ${statements.length} statements`,
      );
    }

    return body.map(toResult);
  }
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

/**
 * Run a single statement and return its rows, or throw StoreQueryError
 * carrying the store's own message.
 */
export async function queryRows(
  executor: StatementExecutor,
  statement: Statement,
  operation: string,
): Promise<unknown[][]> {
  const [result] = await executor.execute([statement]);
  if (!result) {
    throw new MemoryError("StoreProtocolError", `Store returned no result for ${operation}`);
  }
  if (result.kind === "error") {
    throw new MemoryError("StoreQueryError", `Store ${operation} error: ${result.message}`);
  }
  return result.rows;
}
