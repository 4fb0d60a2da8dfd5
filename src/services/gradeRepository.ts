import { AnalyzedRow, Dataset, StudentRecord } from "../models/StudentRecord";
import { Curriculum } from "../models/Curriculum";
import { ScoringScheme } from "../types/types";
import { creditWeightedScheme } from "./ranking";

/**
 * The dataset snapshot loaded at start-up, shared read-only by every request.
 * Uploaded files are analysed per request and never replace it.
 */
export class GradeRepository {
  private readonly snapshot: Dataset;
  readonly scheme: ScoringScheme;

  constructor(
    dataset: Dataset,
    readonly curriculum: Curriculum,
    readonly passMark: number
  ) {
    this.snapshot = dataset;
    this.scheme = creditWeightedScheme(curriculum);
  }

  get dataset(): Dataset {
    return this.snapshot;
  }

  get rows(): ReadonlyArray<AnalyzedRow> {
    return this.snapshot.rows;
  }

  get students(): ReadonlyArray<StudentRecord> {
    return this.snapshot.students;
  }
}
