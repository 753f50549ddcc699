import { Logger } from "../../config/logger";
import { PersonalDetailsInput, PersonalDetailsRow } from "../../shared/types/applicant.types";
import { readString, RecordFields, RecordStore, StoreRecord } from "../record-store";
import { APPLICANT_LINK_FIELD, PERSONAL_DETAILS_FIELDS, PERSONAL_DETAILS_TABLE } from "../tables";

export class PersonalDetailsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly store: RecordStore,
  ) {}

  async findByApplicant(applicantId: string): Promise<PersonalDetailsRow | null> {
    const records = await this.store.query(PERSONAL_DETAILS_TABLE, {
      field: APPLICANT_LINK_FIELD,
      equals: applicantId,
    });
    if (records.length > 1) {
      this.logger.warn("Multiple personal details records linked to applicant, using the first", {
        applicantId,
        records: records.length,
      });
    }
    const first = records[0];
    return first ? toPersonalDetailsRow(first) : null;
  }

  async create(applicantId: string, input: PersonalDetailsInput): Promise<string> {
    const record = await this.store.create(PERSONAL_DETAILS_TABLE, toFields(applicantId, input));
    this.logger.info("Personal details record created", { applicantId, recordId: record.id });
    return record.id;
  }

  async update(recordId: string, applicantId: string, input: PersonalDetailsInput): Promise<void> {
    await this.store.update(PERSONAL_DETAILS_TABLE, recordId, toFields(applicantId, input));
    this.logger.info("Personal details record updated", { applicantId, recordId });
  }
}

function toFields(applicantId: string, input: PersonalDetailsInput): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [PERSONAL_DETAILS_FIELDS.fullName]: input.fullName,
    [PERSONAL_DETAILS_FIELDS.email]: input.email,
    [PERSONAL_DETAILS_FIELDS.location]: input.location,
    [PERSONAL_DETAILS_FIELDS.linkedin]: input.linkedin,
  };
}

function toPersonalDetailsRow(record: StoreRecord): PersonalDetailsRow {
  return {
    id: record.id,
    fullName: readString(record.fields, PERSONAL_DETAILS_FIELDS.fullName),
    email: readString(record.fields, PERSONAL_DETAILS_FIELDS.email),
    location: readString(record.fields, PERSONAL_DETAILS_FIELDS.location),
    linkedin: readString(record.fields, PERSONAL_DETAILS_FIELDS.linkedin),
  };
}
