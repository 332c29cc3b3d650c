/**
 * Prompt construction
 *
 * Pure functions from (question, retrieved data) to message lists. Each
 * builder returns exactly two messages: a system instruction and a user turn
 * carrying the question and the serialized source data.
 */

import type {
  ChatMessage,
  DeepDiveResults,
  SearchResults,
  SocialSearchResults,
} from '../types/index.js';

export const NO_RESULTS = 'No results available.';

/** Upper bound on serialized source data per prompt, in characters */
const MAX_DATA_CHARS = 60000;

function formatData(data: unknown): string {
  if (data === null || data === undefined) {
    return NO_RESULTS;
  }
  const serialized = JSON.stringify(data, null, 2);
  if (serialized.length <= MAX_DATA_CHARS) {
    return serialized;
  }
  return `${serialized.slice(0, MAX_DATA_CHARS)}\n... [truncated]`;
}

function formatText(text: string | null): string {
  return text && text.trim().length > 0 ? text : NO_RESULTS;
}

function pair(system: string, user: string): ChatMessage[] {
  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}

// ============================================================================
// Reddit URL Selection
// ============================================================================

export function buildUrlSelectionMessages(question: string, redditResults: SocialSearchResults | null): ChatMessage[] {
  return pair(
    `You are a research assistant choosing which Reddit discussions are worth reading in full.
Pick the posts whose titles suggest they directly address the user's question.
Return only URLs that appear in the provided list. Prefer a handful of highly relevant threads over many loosely related ones.
If nothing is relevant, return an empty list.`,
    `User question: ${question}

Reddit posts:
${formatData(redditResults)}`
  );
}

// ============================================================================
// Source Analysis
// ============================================================================

export function buildGoogleAnalysisMessages(question: string, googleResults: SearchResults | null): ChatMessage[] {
  return pair(
    `You are an analyst reviewing Google search results.
Extract the facts, figures and authoritative sources that help answer the user's question.
Note the knowledge panel when present. Say so plainly if the results do not address the question.`,
    `User question: ${question}

Google search results:
${formatData(googleResults)}`
  );
}

export function buildBingAnalysisMessages(question: string, bingResults: SearchResults | null): ChatMessage[] {
  return pair(
    `You are an analyst reviewing Bing search results.
Extract the facts, figures and sources that help answer the user's question, and point out anything Bing surfaces that a typical Google result page might not.
Say so plainly if the results do not address the question.`,
    `User question: ${question}

Bing search results:
${formatData(bingResults)}`
  );
}

export function buildRedditAnalysisMessages(
  question: string,
  redditResults: SocialSearchResults | null,
  redditPostData: DeepDiveResults | null
): ChatMessage[] {
  return pair(
    `You are an analyst reviewing Reddit discussions.
Summarize first-hand experiences, recurring opinions and points of disagreement relevant to the user's question.
Distinguish community sentiment from verifiable fact.`,
    `User question: ${question}

Reddit posts:
${formatData(redditResults)}

Comments from selected threads:
${formatData(redditPostData)}`
  );
}

// ============================================================================
// Synthesis
// ============================================================================

export function buildSynthesisMessages(
  question: string,
  googleAnalysis: string | null,
  bingAnalysis: string | null,
  redditAnalysis: string | null
): ChatMessage[] {
  return pair(
    `You are a research assistant writing the final answer to the user's question.
Combine the three source analyses into one clear, well-organized answer.
Lead with the direct answer, then supporting detail. Where sources disagree, say so and explain which is more credible.`,
    `User question: ${question}

Google analysis:
${formatText(googleAnalysis)}

Bing analysis:
${formatText(bingAnalysis)}

Reddit analysis:
${formatText(redditAnalysis)}`
  );
}
