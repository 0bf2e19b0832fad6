// Salvage resolution
export { SalvageResolver, accumulateNeeds, totalNeeds, isEmptyNeeds } from "./salvage";

// Per-character requirements
export { CharacterRequirementCalculator } from "./characterRequirements";

// Roster reports
export { RosterAnalyzer, summarizeReport } from "./rosterAnalysis";

// Guild coverage
export { CoverageMatrix, CoverageMatrixBuilder, UnitCoverage } from "./coverageMatrix";
export type { UnitCoverageMeta } from "./coverageMatrix";

// Requirement coverage and path eligibility
export {
  CoverageAnalyzer,
  coverageRatio,
  isEligibleForPath,
  filterByPath,
  filterCharactersOnly,
} from "./coverage";

// Gaps
export { GapAnalyzer, classifySeverity } from "./gaps";

// Scarce units
export { BottleneckAnalyzer } from "./bottlenecks";
