import { Logger } from "../../config/logger";
import { ShortlistedLeadInput } from "../../shared/types/applicant.types";
import { RecordStore } from "../record-store";
import { SHORTLISTED_LEAD_FIELDS, SHORTLISTED_LEADS_TABLE } from "../tables";

export class ShortlistedLeadsRepository {
  constructor(
    private readonly logger: Logger,
    private readonly store: RecordStore,
  ) {}

  async existsForApplicant(applicantId: string): Promise<boolean> {
    const records = await this.store.query(SHORTLISTED_LEADS_TABLE, {
      field: SHORTLISTED_LEAD_FIELDS.applicant,
      equals: applicantId,
    });
    return records.length > 0;
  }

  async create(input: ShortlistedLeadInput): Promise<string> {
    const record = await this.store.create(SHORTLISTED_LEADS_TABLE, {
      [SHORTLISTED_LEAD_FIELDS.applicant]: [input.applicantId],
      [SHORTLISTED_LEAD_FIELDS.compressedJson]: input.compressedJson,
      [SHORTLISTED_LEAD_FIELDS.scoreReason]: input.scoreReason,
      [SHORTLISTED_LEAD_FIELDS.createdAt]: input.createdAt,
    });
    this.logger.info("Shortlisted lead created", {
      applicantId: input.applicantId,
      recordId: record.id,
    });
    return record.id;
  }
}
