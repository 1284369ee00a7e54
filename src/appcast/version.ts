/**
 * Version comparison for appcast entries.
 *
 * Version strings are free-form: "1.2.0", "1.2rc1", "2024.05b3". A string is
 * split into runs of digits, single periods and everything else, and the runs
 * are compared pairwise. Trailing text sorts below the bare version
 * ("1.5b3" < "1.5") while trailing numbers sort above it ("1.5.1" > "1.5").
 */

export type VersionTokenKind = "number" | "period" | "string";

export interface VersionToken {
  readonly kind: VersionTokenKind;
  readonly text: string;
}

export type VersionOrdering = -1 | 0 | 1;

export function classifyVersionChar(char: string): VersionTokenKind {
  if (char === ".") {
    return "period";
  }
  if (char >= "0" && char <= "9") {
    return "number";
  }
  return "string";
}

/**
 * Splits a version string into tokens. "1.20rc3" becomes
 * ["1", ".", "20", "rc", "3"]. Every period is a token of its own, so ".."
 * marks an empty component.
 */
export function splitVersionString(version: string): VersionToken[] {
  const tokens: VersionToken[] = [];
  let current = "";
  let currentKind: VersionTokenKind | undefined;

  for (const char of version) {
    const kind = classifyVersionChar(char);
    if (
      currentKind !== undefined &&
      (kind !== currentKind || currentKind === "period")
    ) {
      tokens.push({ kind: currentKind, text: current });
      current = "";
    }
    current += char;
    currentKind = kind;
  }

  if (currentKind !== undefined) {
    tokens.push({ kind: currentKind, text: current });
  }

  return tokens;
}

/**
 * Reads the leading digits of a token as an integer. Anything without leading
 * digits counts as zero.
 */
export function parseVersionNumber(text: string): bigint {
  const digits = /^\d+/u.exec(text);
  return digits ? BigInt(digits[0]) : 0n;
}

/**
 * Compares two version strings. Never throws: malformed input still yields a
 * defined ordering.
 */
export function compareVersions(a: string, b: string): VersionOrdering {
  const partsA = splitVersionString(a);
  const partsB = splitVersionString(b);

  const common = Math.min(partsA.length, partsB.length);
  for (let index = 0; index < common; index += 1) {
    const result = compareTokens(partsA[index], partsB[index]);
    if (result !== 0) {
      return result;
    }
  }

  if (partsA.length === partsB.length) {
    return 0;
  }

  // The first token the shorter version lacks decides the order.
  const aIsLonger = partsA.length > partsB.length;
  const extra = aIsLonger ? partsA[common] : partsB[common];
  const longerWins = extra?.kind !== "string";
  return longerWins === aIsLonger ? 1 : -1;
}

/**
 * Returns true when `candidate` sorts strictly above `current`.
 */
export function isNewerVersion(current: string, candidate: string): boolean {
  return compareVersions(current, candidate) < 0;
}

function compareTokens(
  a: VersionToken | undefined,
  b: VersionToken | undefined,
): VersionOrdering {
  if (!a || !b) {
    return 0;
  }

  if (a.kind === b.kind) {
    switch (a.kind) {
      case "string":
        return toOrdering(Buffer.compare(Buffer.from(a.text), Buffer.from(b.text)));
      case "number": {
        const numberA = parseVersionNumber(a.text);
        const numberB = parseVersionNumber(b.text);
        if (numberA === numberB) {
          return 0;
        }
        return numberA > numberB ? 1 : -1;
      }
      case "period":
        return 0;
    }
  }

  // 1.2.0 > 1.2rc1
  if (b.kind === "string") {
    return 1;
  }
  if (a.kind === "string") {
    return -1;
  }

  // A number against a period: the period is the malformed side.
  return a.kind === "number" ? 1 : -1;
}

function toOrdering(value: number): VersionOrdering {
  if (value === 0) {
    return 0;
  }
  return value > 0 ? 1 : -1;
}
