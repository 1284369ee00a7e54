import type { Appcast } from "../appcast/types.js";

export interface UpdateNotifier {
  updateAvailable(appcast: Appcast, currentVersion: string): void;
  noUpdates(currentVersion: string): void;
  error(error: unknown): void;
}
