import { JOB_ERROR_KINDS, JOB_STATUSES, MEDIA_FORMATS } from "@mediasift/utils";
import { pgEnum } from "drizzle-orm/pg-core";

export const jobStatusEnum = pgEnum("job_status", JOB_STATUSES);
export const jobErrorKindEnum = pgEnum("job_error_kind", JOB_ERROR_KINDS);
export const mediaFormatEnum = pgEnum("media_format", MEDIA_FORMATS);
