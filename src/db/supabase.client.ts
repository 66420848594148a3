import fetch from "node-fetch";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export type SupabaseFilterValue = string | number;

export interface SelectOptions {
  columns?: string;
  orderBy?: { column: string; ascending?: boolean };
  limit?: number;
}

export class SupabaseRestClient {
  constructor(private readonly config: SupabaseRestClientConfig) {}

  async insert(table: string, payload: Record<string, unknown>): Promise<void> {
    await this.request("POST", `/rest/v1/${table}`, payload, {
      prefer: "return=minimal",
    });
  }

  async insertReturning<T>(
    table: string,
    payload: Record<string, unknown> | Array<Record<string, unknown>>,
  ): Promise<T[]> {
    return this.requestRows<T>("POST", `/rest/v1/${table}`, payload, {
      prefer: "return=representation",
    });
  }

  async upsertReturning<T>(
    table: string,
    payload: Record<string, unknown>,
    options: { onConflict: string },
  ): Promise<T[]> {
    return this.requestRows<T>(
      "POST",
      `/rest/v1/${table}?on_conflict=${encodeURIComponent(options.onConflict)}`,
      payload,
      {
        prefer: "resolution=merge-duplicates,return=representation",
      },
    );
  }

  async selectOne<T>(
    table: string,
    filters: Record<string, SupabaseFilterValue>,
    columns = "*",
  ): Promise<T | null> {
    const rows = await this.selectMany<T>(table, filters, { columns, limit: 1 });
    if (!rows.length) {
      return null;
    }
    return rows[0];
  }

  async selectMany<T>(
    table: string,
    filters: Record<string, SupabaseFilterValue>,
    options?: SelectOptions,
  ): Promise<T[]> {
    const query = new URLSearchParams();
    query.set("select", options?.columns ?? "*");
    for (const [key, value] of Object.entries(filters)) {
      query.set(key, `eq.${value}`);
    }
    if (options?.orderBy) {
      query.set("order", `${options.orderBy.column}.${options.orderBy.ascending === false ? "desc" : "asc"}`);
    }
    if (typeof options?.limit === "number") {
      query.set("limit", String(options.limit));
    }

    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
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

  private async requestRows<T>(
    method: "POST",
    path: string,
    payload: unknown,
    extraHeaders?: Record<string, string>,
  ): Promise<T[]> {
    const response = await fetch(`${this.config.url}${path}`, {
      method,
      headers: this.baseHeaders({ accept: "application/json", ...(extraHeaders ?? {}) }),
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase request failed: HTTP ${response.status} - ${body}`);
    }

    const rows: unknown = await response.json();
    return Array.isArray(rows) ? rows : [];
  }

  private async request(
    method: "POST",
    path: string,
    payload: Record<string, unknown>,
    extraHeaders?: Record<string, string>,
  ): Promise<void> {
    const response = await fetch(`${this.config.url}${path}`, {
      method,
      headers: this.baseHeaders(extraHeaders),
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase request failed: HTTP ${response.status} - ${body}`);
    }
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
