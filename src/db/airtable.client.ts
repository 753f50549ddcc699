import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { RecordFields, RecordFilter, RecordStore, StoreRecord } from "./record-store";

export interface AirtableRestClientConfig {
  apiUrl: string;
  baseId: string;
  apiKey: string;
}

interface AirtableRecordResponse {
  id: string;
  createdTime?: string;
  fields?: RecordFields;
}

interface AirtableListResponse {
  records?: AirtableRecordResponse[];
  offset?: string;
}

const PAGE_SIZE = 100;

export class AirtableRestClient implements RecordStore {
  constructor(
    private readonly config: AirtableRestClientConfig,
    private readonly logger?: Logger,
  ) {}

  async get(table: string, recordId: string): Promise<StoreRecord | null> {
    const response = await fetch(this.recordUrl(table, recordId), {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Airtable get failed (${table}): HTTP ${response.status} - ${body}`);
    }

    return toStoreRecord((await response.json()) as AirtableRecordResponse);
  }

  async query(table: string, filter?: RecordFilter): Promise<StoreRecord[]> {
    const records: StoreRecord[] = [];
    let offset: string | undefined;

    do {
      const query = new URLSearchParams();
      query.set("pageSize", String(PAGE_SIZE));
      if (filter) {
        query.set("filterByFormula", buildEqualsFormula(filter));
      }
      if (offset) {
        query.set("offset", offset);
      }

      const response = await fetch(`${this.tableUrl(table)}?${query.toString()}`, {
        method: "GET",
        headers: this.baseHeaders({
          accept: "application/json",
        }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Airtable query failed (${table}): HTTP ${response.status} - ${body}`);
      }

      const page = (await response.json()) as AirtableListResponse;
      for (const record of page.records ?? []) {
        records.push(toStoreRecord(record));
      }
      offset = page.offset;
    } while (offset);

    this.logger?.debug("airtable.query.completed", {
      table,
      filterField: filter?.field,
      records: records.length,
    });
    return records;
  }

  async create(table: string, fields: RecordFields): Promise<StoreRecord> {
    return this.writeRecord("POST", this.tableUrl(table), fields, `create (${table})`);
  }

  async update(table: string, recordId: string, fields: RecordFields): Promise<StoreRecord> {
    return this.writeRecord("PATCH", this.recordUrl(table, recordId), fields, `update (${table})`);
  }

  async delete(table: string, recordId: string): Promise<void> {
    const response = await fetch(this.recordUrl(table, recordId), {
      method: "DELETE",
      headers: this.baseHeaders(),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Airtable delete failed (${table}): HTTP ${response.status} - ${body}`);
    }
  }

  private async writeRecord(
    method: "POST" | "PATCH",
    url: string,
    fields: RecordFields,
    label: string,
  ): Promise<StoreRecord> {
    const response = await fetch(url, {
      method,
      headers: this.baseHeaders({
        accept: "application/json",
      }),
      body: JSON.stringify({ fields: stripUndefined(fields), typecast: true }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Airtable ${label} failed: HTTP ${response.status} - ${body}`);
    }

    return toStoreRecord((await response.json()) as AirtableRecordResponse);
  }

  private tableUrl(table: string): string {
    return `${this.config.apiUrl}/${this.config.baseId}/${encodeURIComponent(table)}`;
  }

  private recordUrl(table: string, recordId: string): string {
    return `${this.tableUrl(table)}/${encodeURIComponent(recordId)}`;
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      authorization: `Bearer ${this.config.apiKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

export function buildEqualsFormula(filter: RecordFilter): string {
  const field = filter.field.replace(/[{}]/g, "");
  const value = filter.equals.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  return `{${field}} = '${value}'`;
}

function toStoreRecord(record: AirtableRecordResponse): StoreRecord {
  return {
    id: record.id,
    createdTime: record.createdTime,
    fields: record.fields ?? {},
  };
}

function stripUndefined(fields: RecordFields): RecordFields {
  const output: RecordFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}
