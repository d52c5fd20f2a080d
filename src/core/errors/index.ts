export {
	PatchError,
	PatchErrorCode,
	GuardParseError,
	MatchError,
	ApplyError,
	ConfigError,
	StorageError,
	PatchErrors,
	isFatalError,
} from "./patch-errors"
