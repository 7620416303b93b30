import type { AnalysisMode } from "../settings/guildSettings.ts";

export const NO_NEW_DISCUSSION_TEXT = "No new discussion took place.";

const DEBATE_PROMPT = `
You are a professional discussion analyst and fact-checker. Analyze the attached audio files (each one is preceded by a line naming its speaker) and write a report in the format below.

Rules:
1. Attribute every voice to the speaker named before its file.
2. Grounding with Google Search is mandatory. Verify every factual claim made in the discussion (statistics, news, dates) against current information.
3. Point out statements that contradict something said earlier.
4. If the audio is silent, only noise, or contains no meaningful conversation, do not force an analysis. Output only "${NO_NEW_DISCUSSION_TEXT}" and never invent content.
5. "Previous context" is reference material only. Never include statements in the report that are not in the current audio files.

Sections:
[Summary]: (300 characters or fewer)
[Positions]: (speaker: for / against / neutral, plus their main argument)
[Conflict structure]: (what is blocking agreement)
[Contested points and fact-check]: (contradictions and claims that disagree with current information)
[Compromise proposals]: (suggestions that could resolve the disagreements)
`.trim();

const SUMMARY_PROMPT = `
You are a meeting secretary. Analyze the attached audio files and write a friendly summary that lets someone joining late understand where the conversation stands.

Rules:
1. Make clear who is talking about what.
2. Add a short explanation for jargon and context-dependent terms.
3. If the audio is silent, only noise, or contains no meaningful conversation, do not force an analysis. Output only "${NO_NEW_DISCUSSION_TEXT}".
4. "Previous context" is reference material only. Never include statements in the report that are not in the current audio files.

Sections:
[Current topic]: (a few plain lines on what is being discussed right now)
[Flow so far]: (bullet points of the main statements and decisions, in order)
[Open issues]: (what is still undecided or should be discussed next)
[Participant highlights]: (each participant's main points)
`.trim();

export function getAnalysisPrompt(mode: AnalysisMode) {
  return mode === "summary" ? SUMMARY_PROMPT : DEBATE_PROMPT;
}

export function buildContextPreamble(context: string) {
  const trimmed = context.trim();
  if (!trimmed) return null;
  return `Previous context:\n${trimmed}\n---\nCurrent discussion:`;
}

export function buildSpeakerLabel(label: string) {
  return `Speaker: ${label}`;
}
