import { ArtifactKind, FetchOutcome, PaperDocument } from "../types";

export interface Sink {
  hasRecord(paperId: string): Promise<boolean>;
  publishRecord(paperId: string, document: PaperDocument): Promise<string>;
  publishOutcomes(kind: ArtifactKind, outcomes: FetchOutcome[]): Promise<void>;
}
