export interface TranscriptMetadataEntry {
  label: string;
  value?: string | null;
}

export interface TranscriptOptions {
  metadata?: TranscriptMetadataEntry[];
  sections?: string[][];
  hint?: string;
}

export function renderTranscript({
  metadata = [],
  sections = [],
  hint,
}: TranscriptOptions): string {
  const lines: string[] = [];

  const metadataLines = metadata
    .filter((entry): entry is TranscriptMetadataEntry & { value: string } => {
      return typeof entry.value === "string" && entry.value.length > 0;
    })
    .map((entry) => `${entry.label}: ${entry.value}`);

  const blocks = sections.filter((block) => block.length > 0);

  blocks.forEach((block, index) => {
    lines.push(...block);
    if (index < blocks.length - 1 || metadataLines.length > 0) {
      lines.push("");
    }
  });

  lines.push(...metadataLines);

  if (hint) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(hint);
  }

  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
