import { formatCliOutput } from "../utils/output.js";

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  const { body } = payload;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(formatCliOutput(normalizedBody));
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}
