import { readFileSync } from "node:fs";
import { z } from "zod";
import type { SubdomainSource } from "./types.js";

const WordlistsSchema = z.object({
  common: z.array(z.string()),
  extended: z.array(z.string()),
});

const wordlists = WordlistsSchema.parse(
  JSON.parse(readFileSync(new URL("./wordlists.json", import.meta.url), "utf-8")),
);

export const COMMON_LABELS: readonly string[] = wordlists.common;
export const EXTENDED_LABELS: readonly string[] = wordlists.extended;

export function expandLabels(labels: readonly string[], domain: string): string[] {
  return labels.map((label) => `${label}.${domain}`);
}

/** A source that prefixes a fixed label list onto the domain. No network. */
export function createWordlistSource(
  id: SubdomainSource["id"],
  labels: readonly string[],
): SubdomainSource {
  return {
    id,
    async collect({ domain }) {
      return expandLabels(labels, domain);
    },
  };
}

export const commonWordlistSource = createWordlistSource("wordlist-common", COMMON_LABELS);
export const extendedWordlistSource = createWordlistSource("wordlist-extended", EXTENDED_LABELS);
