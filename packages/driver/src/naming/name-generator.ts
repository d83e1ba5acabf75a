import { randomInt } from "node:crypto";
import {
  MAX_SERVER_NAME_LENGTH,
  NAME_SUFFIX_LENGTH,
  NO_LOGIN_PLACEHOLDER,
} from "../constants";
import type { EnvironmentProbe } from "../interface/environment-probe";

const SUFFIX_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz";

export type SuffixGenerator = () => string;

/**
 * Random base-36 suffix. Only used to avoid collisions between runs.
 */
export function randomSuffix(length = NAME_SUFFIX_LENGTH): string {
  let suffix = "";
  for (let i = 0; i < length; i++) {
    suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  }
  return suffix;
}

/** Drop everything but letters and digits, hyphens included. */
export function sanitizeNameComponent(value: string): string {
  return value.replace(/[^A-Za-z0-9]/g, "");
}

/**
 * Shorten the longest part one character at a time until the parts fit in
 * `budget`. No part drops below one character.
 */
function fitComponents(parts: string[], budget: number): string[] {
  const lengths = parts.map((p) => p.length);
  let total = lengths.reduce((sum, n) => sum + n, 0);

  while (total > budget) {
    let longest = 0;
    for (let i = 1; i < lengths.length; i++) {
      if (lengths[i] > lengths[longest]) longest = i;
    }
    if (lengths[longest] <= 1) break;
    lengths[longest]--;
    total--;
  }

  return parts.map((p, i) => p.slice(0, lengths[i]));
}

/**
 * Build `<base>-<login>-<hostname>-<suffix>`, capped at 63 characters.
 *
 * Over the cap, the longest of base, login and hostname is shortened first,
 * so all four parts and their three separators survive.
 */
export function generateServerName(
  baseName: string,
  probe: EnvironmentProbe,
  suffix: SuffixGenerator = randomSuffix,
  maxLength = MAX_SERVER_NAME_LENGTH
): string {
  const login = probe.login() || NO_LOGIN_PLACEHOLDER;
  const parts = [baseName, login, probe.hostname()].map(sanitizeNameComponent);

  const tail = suffix();
  const budget = maxLength - tail.length - parts.length;

  return [...fitComponents(parts, budget), tail].join("-");
}
