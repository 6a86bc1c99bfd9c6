// CHANGE: Central export point for CORE type definitions
// PURITY: CORE (types only)

export type { CLIOptions } from "./config.js";
export type {
	Candidate,
	CandidateOrigin,
	CheckOutcome,
	DecisionState,
	Digest,
	ExitCode,
	RangeRecord,
	RunStatistics,
	Verdict,
} from "../models.js";
