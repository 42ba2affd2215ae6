/**
 * Deterministic merge of extracted user facts into a markdown profile.
 *
 * A profile is a title block followed by `## Section` blocks of bullets.
 * Incoming sections match existing ones by heading, case-insensitively.
 * Inside a matched section a `- Key: value` bullet replaces the existing
 * bullet with the same key; any other new line is appended unless already
 * present. Sections the extraction does not mention are left alone.
 */

import { NO_NEW_INFO } from "./prompts.js";

export const PROFILE_TITLE = "# User Profile";

const UNTITLED_SECTION = "General";

type ProfileSection = {
  heading: string;
  lines: string[];
};

type ParsedProfile = {
  preamble: string[];
  sections: ProfileSection[];
};

const HEADING_RE = /^##\s+(.+?)\s*#*\s*$/;
const BULLET_RE = /^\s*[-*+]\s+(.*)$/;
const KEY_RE = /^([^:：]{1,64})[:：]\s*\S/;
const FENCE_RE = /^```[\w-]*\s*\n([\s\S]*?)\n```\s*$/;

export function isNoNewInfo(extracted: string): boolean {
  const text = extracted.trim();
  return text === "" || text.includes(NO_NEW_INFO);
}

/**
 * Remove a code fence the model may wrap its markdown in
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_RE.exec(trimmed);
  return match?.[1] ?? trimmed;
}

export function parseProfile(text: string): ParsedProfile {
  const parsed: ParsedProfile = { preamble: [], sections: [] };
  let current: ProfileSection | null = null;
  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    const heading = HEADING_RE.exec(line);
    if (heading?.[1]) {
      current = { heading: heading[1], lines: [] };
      parsed.sections.push(current);
    } else if (current) {
      current.lines.push(line);
    } else {
      parsed.preamble.push(line);
    }
  }
  return parsed;
}

export function renderProfile(profile: ParsedProfile): string {
  const parts: string[] = [];
  const preamble = trimBlankEdges(profile.preamble).join("\n");
  if (preamble) parts.push(preamble);
  for (const section of profile.sections) {
    const body = trimBlankEdges(section.lines).join("\n");
    parts.push(body ? `## ${section.heading}\n${body}` : `## ${section.heading}`);
  }
  return parts.join("\n\n") + "\n";
}

export function mergeProfile(existing: string, extracted: string): string {
  const base = existing.trim() ? parseProfile(existing) : { preamble: [PROFILE_TITLE], sections: [] };
  const incoming = parseProfile(stripCodeFence(extracted));

  // Facts reported before any heading land in a catch-all section.
  const loose = incoming.preamble.filter((line) => line.trim() && !line.trim().startsWith("#"));
  if (loose.length > 0) {
    incoming.sections.unshift({ heading: UNTITLED_SECTION, lines: loose });
  }

  for (const section of incoming.sections) {
    const target = base.sections.find((s) => normalizeHeading(s.heading) === normalizeHeading(section.heading));
    if (!target) {
      base.sections.push({ heading: section.heading, lines: dedupeLines(section.lines) });
      continue;
    }
    for (const line of section.lines) {
      if (!line.trim()) continue;
      mergeLine(target, line);
    }
  }
  return renderProfile(base);
}

function mergeLine(section: ProfileSection, line: string): void {
  const key = bulletKey(line);
  if (key) {
    const index = section.lines.findIndex((existing) => bulletKey(existing) === key);
    if (index >= 0) {
      section.lines[index] = line;
      return;
    }
  }
  if (section.lines.some((existing) => normalizeLine(existing) === normalizeLine(line))) return;
  section.lines.splice(lastContentIndex(section.lines) + 1, 0, line);
}

function bulletKey(line: string): string | null {
  const bullet = BULLET_RE.exec(line);
  if (!bullet?.[1]) return null;
  const key = KEY_RE.exec(bullet[1].replace(/\*\*/g, ""));
  return key?.[1] ? key[1].trim().toLowerCase() : null;
}

function normalizeHeading(heading: string): string {
  return heading.trim().toLowerCase();
}

function normalizeLine(line: string): string {
  return line.trim().replace(/\s+/g, " ").toLowerCase();
}

function lastContentIndex(lines: string[]): number {
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    if (lines[i]?.trim()) return i;
  }
  return -1;
}

function dedupeLines(lines: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const line of lines) {
    if (line.trim()) {
      const normalized = normalizeLine(line);
      if (seen.has(normalized)) continue;
      seen.add(normalized);
    }
    result.push(line);
  }
  return result;
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start]?.trim()) start += 1;
  while (end > start && !lines[end - 1]?.trim()) end -= 1;
  return lines.slice(start, end);
}
