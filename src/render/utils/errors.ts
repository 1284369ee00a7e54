import { CliError } from "../../cli/errors.js";
import { formatErrorMessage } from "../../utils/output.js";
import { renderTranscript } from "./transcript.js";

export function renderCliError(error: CliError): string {
  return renderTranscript({
    sections: [[formatErrorMessage(error.headline), ...error.detailLines]],
    hint: error.hintLines.length > 0 ? error.hintLines.join("\n") : undefined,
  });
}
