/**
 * One test found in an input unit.
 */
export interface ExtractedTest {
  /** Grouping name from the enclosing test macro; absent for literal names. */
  readonly testcaseName: string | undefined;
  /** The test name exactly as written, without surrounding whitespace. */
  readonly rawName: string;
}
