import {ListAttemptsInput, PublishAttempt, RecordAttemptInput} from "../types/publish.types";

export interface IPublishStateRepository {
  getLastPublishedClock(boardId: number): string | null;
  markPublished(boardId: number, clock: string, now: number): void;

  recordAttempt(input: RecordAttemptInput): PublishAttempt;
  listAttempts(input: ListAttemptsInput): PublishAttempt[];
}
