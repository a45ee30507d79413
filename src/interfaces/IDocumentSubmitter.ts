import {SubmissionResult} from "../types/publish.types";

export interface IDocumentSubmitter {
  submit(document: string): Promise<SubmissionResult>;
}
