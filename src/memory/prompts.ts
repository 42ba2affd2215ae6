import type { ConversationMessage } from "./types.js";

export const NO_NEW_INFO = "NO_NEW_INFO";

export const SUMMARIZATION_SYSTEM_PROMPT = `
You condense long multi-turn conversations into a compact background memory.

Rules:
- Keep every key fact: the user's questions, decisions, conclusions and the state of projects or tasks.
- Drop pleasantries, repetition and turns with no substance.
- Write in the third person, as connected paragraphs rather than a list.
- Aim for roughly a quarter of the original length.
- Output the summary only, with no preamble.
`.trim();

export const INCREMENTAL_SUMMARIZATION_SYSTEM_PROMPT = `
You maintain a running summary of a conversation.
Merge the existing summary with the new conversation into one updated summary.

Rules:
- Facts in the existing summary stay valid unless the new conversation overrides them.
- Fold important new information in; do not quote it verbatim.
- The result should be shorter than both parts together. Remove stale or duplicated content.
- Third person, paragraph form.
- Output the merged summary only, with no preamble.
`.trim();

export const EXTRACTION_SYSTEM_PROMPT = `
You extract facts about the user from a conversation.

Rules:
- Only extract information stated explicitly or inferable with high confidence. Never invent.
- Output markdown: one "## Category" heading per category, one "- Key: value" bullet per fact.
- Omit categories with nothing to report.
- Report only information that is new or changes the existing profile.
- If there is nothing new, output exactly: ${NO_NEW_INFO}

Typical categories: Identity, Work, Skills, Preferences, Projects, Goals, Background.
`.trim();

export function formatTranscript(messages: ConversationMessage[]): string {
  return messages.map((message) => `[${message.timestamp}] ${message.role}: ${message.content}`).join("\n");
}

export function buildSummarizationPrompt(messages: ConversationMessage[], targetLength = 300): string {
  return [
    "Compress the following conversation into a memory summary.",
    "",
    "===== Conversation =====",
    formatTranscript(messages),
    "",
    "===== Requirements =====",
    `- About ${targetLength} words`,
    "- Keep user intent, decisions, project progress and important facts",
  ].join("\n");
}

export function buildIncrementalSummarizationPrompt(
  existingSummary: string,
  messages: ConversationMessage[],
  targetLength = 400,
): string {
  return [
    "Merge the existing summary and the new conversation into one updated summary.",
    "",
    "===== Existing summary =====",
    existingSummary.trim() || "(none)",
    "",
    "===== New conversation =====",
    formatTranscript(messages),
    "",
    "===== Requirements =====",
    `- About ${targetLength} words`,
  ].join("\n");
}

export function buildExtractionPrompt(messages: ConversationMessage[], existingProfile: string): string {
  return [
    "Extract user information from the conversation below.",
    "",
    "===== Current profile =====",
    existingProfile.trim() || "(empty)",
    "",
    "===== Conversation =====",
    formatTranscript(messages),
  ].join("\n");
}
