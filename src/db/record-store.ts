export type FieldValue = string | number | boolean | null | string[];

export type RecordFields = Record<string, FieldValue | undefined>;

export interface StoreRecord {
  id: string;
  createdTime?: string;
  fields: RecordFields;
}

export interface RecordFilter {
  field: string;
  equals: string;
}

export interface RecordStore {
  get(table: string, recordId: string): Promise<StoreRecord | null>;
  query(table: string, filter?: RecordFilter): Promise<StoreRecord[]>;
  create(table: string, fields: RecordFields): Promise<StoreRecord>;
  update(table: string, recordId: string, fields: RecordFields): Promise<StoreRecord>;
  delete(table: string, recordId: string): Promise<void>;
}

export function readString(fields: RecordFields, name: string): string | null {
  const value = fields[name];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

export function readNumber(fields: RecordFields, name: string): number | null {
  const value = fields[name];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
