import { Logger } from "../../config/logger";
import {
  ApplicantRow,
  EnrichmentFieldsInput,
  ShortlistStatus,
} from "../../shared/types/applicant.types";
import { readNumber, readString, RecordStore, StoreRecord } from "../record-store";
import { APPLICANT_FIELDS, APPLICANTS_TABLE } from "../tables";

export class ApplicantsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly store: RecordStore,
  ) {}

  async getById(applicantId: string): Promise<ApplicantRow | null> {
    const record = await this.store.get(APPLICANTS_TABLE, applicantId);
    return record ? toApplicantRow(record) : null;
  }

  async listAll(): Promise<ApplicantRow[]> {
    const records = await this.store.query(APPLICANTS_TABLE);
    return records.map(toApplicantRow);
  }

  async create(): Promise<string> {
    const record = await this.store.create(APPLICANTS_TABLE, {
      [APPLICANT_FIELDS.shortlistStatus]: "Pending",
    });
    this.logger.info("Applicant record created", { applicantId: record.id });
    return record.id;
  }

  async saveCompressedJson(applicantId: string, compressedJson: string): Promise<void> {
    await this.store.update(APPLICANTS_TABLE, applicantId, {
      [APPLICANT_FIELDS.compressedJson]: compressedJson,
    });
    this.logger.debug("Compressed JSON persisted", {
      applicantId,
      length: compressedJson.length,
    });
  }

  async saveShortlistStatus(applicantId: string, status: ShortlistStatus): Promise<void> {
    await this.store.update(APPLICANTS_TABLE, applicantId, {
      [APPLICANT_FIELDS.shortlistStatus]: status,
    });
  }

  async saveEnrichment(applicantId: string, input: EnrichmentFieldsInput): Promise<void> {
    await this.store.update(APPLICANTS_TABLE, applicantId, {
      [APPLICANT_FIELDS.llmSummary]: input.summary,
      [APPLICANT_FIELDS.llmScore]: input.score,
      [APPLICANT_FIELDS.llmIssues]: input.issues,
      [APPLICANT_FIELDS.llmFollowUps]: input.followUps,
    });
  }
}

function toApplicantRow(record: StoreRecord): ApplicantRow {
  return {
    id: record.id,
    compressedJson: readString(record.fields, APPLICANT_FIELDS.compressedJson),
    shortlistStatus: parseShortlistStatus(readString(record.fields, APPLICANT_FIELDS.shortlistStatus)),
    llmSummary: readString(record.fields, APPLICANT_FIELDS.llmSummary),
    llmScore: readNumber(record.fields, APPLICANT_FIELDS.llmScore),
    llmIssues: readString(record.fields, APPLICANT_FIELDS.llmIssues),
    llmFollowUps: readString(record.fields, APPLICANT_FIELDS.llmFollowUps),
  };
}

function parseShortlistStatus(value: string | null): ShortlistStatus | null {
  if (value === "Pending" || value === "Shortlisted" || value === "Rejected") {
    return value;
  }
  return null;
}
