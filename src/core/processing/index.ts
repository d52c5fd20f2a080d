export { FileProcessor, type FileProcessorOptions, type FileTarget } from "./FileProcessor"
export { PatchRunner, toCoreActions, type PatchRunnerDependencies } from "./PatchRunner"
export {
	formatRunSummary,
	summarizeResults,
	toDiagnostic,
	type ActionResult,
	type ActionStatus,
	type CoreAction,
	type FileDiagnostic,
	type FileResult,
	type RunResult,
	type RunSummary,
} from "./results"
