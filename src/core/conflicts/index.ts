export { buildConflictReport, formatConflictSummary, type ConflictReport, type NearMiss } from "./ConflictReporter"
