import { Logger } from "../../config/logger";
import { WorkExperienceInput, WorkExperienceRow } from "../../shared/types/applicant.types";
import { readString, RecordFields, RecordStore, StoreRecord } from "../record-store";
import { APPLICANT_LINK_FIELD, WORK_EXPERIENCE_FIELDS, WORK_EXPERIENCE_TABLE } from "../tables";

export class WorkExperienceRepository {
  constructor(
    private readonly logger: Logger,
    private readonly store: RecordStore,
  ) {}

  // Store query order; the compressed document and reconciliation both index into it.
  async listByApplicant(applicantId: string): Promise<WorkExperienceRow[]> {
    const records = await this.store.query(WORK_EXPERIENCE_TABLE, {
      field: APPLICANT_LINK_FIELD,
      equals: applicantId,
    });
    return records.map(toWorkExperienceRow);
  }

  async create(applicantId: string, input: WorkExperienceInput): Promise<string> {
    const record = await this.store.create(WORK_EXPERIENCE_TABLE, toFields(applicantId, input));
    this.logger.info("Work experience record created", { applicantId, recordId: record.id });
    return record.id;
  }

  async update(recordId: string, applicantId: string, input: WorkExperienceInput): Promise<void> {
    await this.store.update(WORK_EXPERIENCE_TABLE, recordId, toFields(applicantId, input));
    this.logger.info("Work experience record updated", { applicantId, recordId });
  }

  async delete(recordId: string, applicantId: string): Promise<void> {
    await this.store.delete(WORK_EXPERIENCE_TABLE, recordId);
    this.logger.info("Work experience record deleted", { applicantId, recordId });
  }
}

function toFields(applicantId: string, input: WorkExperienceInput): RecordFields {
  return {
    [APPLICANT_LINK_FIELD]: [applicantId],
    [WORK_EXPERIENCE_FIELDS.company]: input.company,
    [WORK_EXPERIENCE_FIELDS.title]: input.title,
    // Date columns reject "", null clears them.
    [WORK_EXPERIENCE_FIELDS.startDate]: input.startDate || null,
    [WORK_EXPERIENCE_FIELDS.endDate]: input.endDate || null,
    [WORK_EXPERIENCE_FIELDS.technologies]: input.technologies,
    [WORK_EXPERIENCE_FIELDS.description]: input.description,
  };
}

function toWorkExperienceRow(record: StoreRecord): WorkExperienceRow {
  return {
    id: record.id,
    company: readString(record.fields, WORK_EXPERIENCE_FIELDS.company),
    title: readString(record.fields, WORK_EXPERIENCE_FIELDS.title),
    startDate: readString(record.fields, WORK_EXPERIENCE_FIELDS.startDate),
    endDate: readString(record.fields, WORK_EXPERIENCE_FIELDS.endDate),
    technologies: readString(record.fields, WORK_EXPERIENCE_FIELDS.technologies),
    description: readString(record.fields, WORK_EXPERIENCE_FIELDS.description),
  };
}
