import { ChatPromptTemplate } from "@langchain/core/prompts";

/**
 * Prompt templates used by the chat-model language service.
 * Every template receives the heading trail of the node as `path`.
 */

export const gistPrompt = ChatPromptTemplate.fromMessages([
  [
    "system",
    "You write concise summaries of text excerpts. The summaries are used to sort " +
      "excerpts into topics, so name what the excerpt is about in one or two sentences.",
  ],
  ["human", "Section: {path}\n\nExcerpt:\n{chunk}\n\nSummary:"],
]);

export const proposeHeadersPrompt = ChatPromptTemplate.fromMessages([
  [
    "system",
    "You organise excerpts into a structured report. Given summaries of the excerpts " +
      "in one section, propose the sub-headings that section should be split into. " +
      "Answer with a JSON array of distinct short heading strings, in reading order, " +
      "and nothing else. Answer with an empty array if the section should not be split.",
  ],
  ["human", "Section: {path}\n\nExcerpt summaries:\n{gists}"],
]);

export const classifyPrompt = ChatPromptTemplate.fromMessages([
  [
    "system",
    "You sort excerpts into the sub-headings of a report. Answer with exactly one of " +
      "the given headings, copied verbatim, and nothing else.",
  ],
  ["human", "Section: {path}\n\nHeadings:\n{labels}\n\nExcerpt:\n{chunk}\n\nHeading:"],
]);

export const writeSectionPrompt = ChatPromptTemplate.fromMessages([
  [
    "system",
    "You write one section of a structured report from source excerpts. Write clear " +
      "prose that covers what the excerpts say about the section's topic. Do not add a " +
      "heading; it is added for you. Answer with an empty message if the excerpts say " +
      "nothing worth reporting.",
  ],
  ["human", "Section: {path}\n\nExcerpts:\n{chunks}"],
]);
