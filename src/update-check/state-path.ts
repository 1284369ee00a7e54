import { homedir } from "node:os";
import { join } from "node:path";

const STATE_FILENAME = "state.json";
const APP_DIR = "appcast-updater";

/**
 * Resolve the path to the update-check state file.
 *
 * macOS/Linux:
 *   $XDG_STATE_HOME/appcast-updater/state.json   (when XDG_STATE_HOME is set)
 *   ~/.local/state/appcast-updater/state.json     (fallback)
 */
export function resolveUpdateStatePath(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const xdgState = env.XDG_STATE_HOME;
  const base =
    xdgState && xdgState.length > 0
      ? xdgState
      : join(homedir(), ".local", "state");

  return join(base, APP_DIR, STATE_FILENAME);
}
