import fetch from "node-fetch";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export type SupabaseFilterOperator = "eq" | "gt" | "gte" | "lt" | "lte";

export interface SupabaseFilter {
  column: string;
  operator: SupabaseFilterOperator;
  value: string | number;
}

export interface SupabaseSelectOptions {
  columns?: string;
  filters?: ReadonlyArray<SupabaseFilter>;
  order?: {
    column: string;
    ascending?: boolean;
  };
  limit?: number;
  offset?: number;
}

export class SupabaseRestClient {
  private readonly baseUrl: string;

  constructor(private readonly config: SupabaseRestClientConfig) {
    this.baseUrl = config.url.replace(/\/+$/, "");
  }

  async insert(table: string, payload: Record<string, unknown>): Promise<void> {
    const response = await fetch(`${this.baseUrl}/rest/v1/${table}`, {
      method: "POST",
      headers: this.baseHeaders({
        prefer: "return=minimal",
      }),
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase insert failed: HTTP ${response.status} - ${body}`);
    }
  }

  async selectMany(table: string, options: SupabaseSelectOptions = {}): Promise<unknown[]> {
    const query = buildQuery(options.filters);
    query.set("select", options.columns ?? "*");
    if (options.order) {
      query.set("order", `${options.order.column}.${options.order.ascending ? "asc" : "desc"}`);
    }
    if (options.limit !== undefined) {
      query.set("limit", String(options.limit));
    }
    if (options.offset !== undefined && options.offset > 0) {
      query.set("offset", String(options.offset));
    }

    const response = await fetch(`${this.baseUrl}/rest/v1/${table}?${query.toString()}`, {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed: HTTP ${response.status} - ${body}`);
    }

    const rows: unknown = await response.json();
    return Array.isArray(rows) ? rows : [];
  }

  /**
   * Deletes matching rows and returns how many were removed.
   */
  async deleteMany(table: string, filters: ReadonlyArray<SupabaseFilter>): Promise<number> {
    if (filters.length === 0) {
      throw new Error("Refusing to delete without filters.");
    }
    const query = buildQuery(filters);
    query.set("select", "id");

    const response = await fetch(`${this.baseUrl}/rest/v1/${table}?${query.toString()}`, {
      method: "DELETE",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase delete failed: HTTP ${response.status} - ${body}`);
    }

    const rows: unknown = await response.json();
    return Array.isArray(rows) ? rows.length : 0;
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

function buildQuery(filters: ReadonlyArray<SupabaseFilter> = []): URLSearchParams {
  const query = new URLSearchParams();
  for (const filter of filters) {
    query.append(filter.column, `${filter.operator}.${filter.value}`);
  }
  return query;
}
