export * from "./appcast/index.js";
export {
  runUpdateCheck,
  type UpdateCheckDeps,
  type UpdateCheckMode,
  type UpdateCheckOptions,
  type UpdateCheckOutcome,
  type UpdateCheckStatus,
} from "./update-check/checker.js";
export {
  downloadAppcast,
  type AppcastDownloader,
  type DownloadAppcastOptions,
} from "./update-check/download.js";
export {
  AppcastDownloadError,
  AppcastUrlMissingError,
  UpdateCheckError,
  UpdateStateError,
} from "./update-check/errors.js";
export type { UpdateNotifier } from "./update-check/notifier.js";
export {
  createFileSettingsStore,
  LAST_CHECK_TIME_KEY,
  SKIP_THIS_VERSION_KEY,
  type UpdateSettingsStore,
} from "./update-check/settings-store.js";
export { resolveUpdateStatePath } from "./update-check/state-path.js";
