import { Logger } from "../../config/logger";
import { SalaryPreferenceInput, SalaryPreferenceRow } from "../../shared/types/applicant.types";
import { readNumber, readString, RecordFields, RecordStore, StoreRecord } from "../record-store";
import { APPLICANT_LINK_FIELD, SALARY_PREFERENCE_FIELDS, SALARY_PREFERENCES_TABLE } from "../tables";

export class SalaryPreferencesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly store: RecordStore,
  ) {}

  async findByApplicant(applicantId: string): Promise<SalaryPreferenceRow | null> {
    const records = await this.store.query(SALARY_PREFERENCES_TABLE, {
      field: APPLICANT_LINK_FIELD,
      equals: applicantId,
    });
    if (records.length > 1) {
      this.logger.warn("Multiple salary preference records linked to applicant, using the first", {
        applicantId,
        records: records.length,
      });
    }
    const first = records[0];
    return first ? toSalaryPreferenceRow(first) : null;
  }

  async create(applicantId: string, input: SalaryPreferenceInput): Promise<string> {
    const record = await this.store.create(SALARY_PREFERENCES_TABLE, toFields(applicantId, input));
    this.logger.info("Salary preference record created", { applicantId, recordId: record.id });
    return record.id;
  }

  async update(recordId: string, applicantId: string, input: SalaryPreferenceInput): Promise<void> {
    await this.store.update(SALARY_PREFERENCES_TABLE, recordId, toFields(applicantId, input));
    this.logger.info("Salary preference record updated", { applicantId, recordId });
  }
}

function toFields(applicantId: string, input: SalaryPreferenceInput): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [SALARY_PREFERENCE_FIELDS.preferredRate]: input.preferredRate,
    [SALARY_PREFERENCE_FIELDS.minimumRate]: input.minimumRate,
    [SALARY_PREFERENCE_FIELDS.currency]: input.currency,
    [SALARY_PREFERENCE_FIELDS.availability]: input.availability,
  };
}

function toSalaryPreferenceRow(record: StoreRecord): SalaryPreferenceRow {
  return {
    id: record.id,
    preferredRate: readNumber(record.fields, SALARY_PREFERENCE_FIELDS.preferredRate),
    minimumRate: readNumber(record.fields, SALARY_PREFERENCE_FIELDS.minimumRate),
    currency: readString(record.fields, SALARY_PREFERENCE_FIELDS.currency),
    availability: readNumber(record.fields, SALARY_PREFERENCE_FIELDS.availability),
  };
}
