import { RecordParseError } from "../core/errors";
import { MetadataRecord } from "../types";

export interface InvalidRecord {
  filePath: string;
  error: RecordParseError;
}

export interface RecordListing {
  records: MetadataRecord[];
  invalid: InvalidRecord[];
}
