export * from "@patchweave/types"

export * from "./core/errors"
export * from "./core/guards"
export * from "./core/patches"
export * from "./core/matching"
export * from "./core/conflicts"
export * from "./core/apply"
export * from "./core/rules"
export * from "./core/processing"
export { PathFilterController } from "./services/path-filter/PathFilterController"
export { NodeFileSystem, SandboxFileSystem, type PatchFileSystem } from "./utils/file-system"
export { MemoryFileSystem } from "./utils/memory-file-system"
export {
	createConsoleLogger,
	createSilentLogger,
	withPrefix,
	type LogFunction,
	type Logger,
} from "./utils/logging"
