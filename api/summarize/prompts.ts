import type { SummaryMode } from "../../src/lib/summarize/types";

export type SummaryPrompt = {
  mode: SummaryMode;
  system: string;
  user: string;
  inputChars: number;
  truncated: boolean;
};

const SYSTEM_PROMPT =
  "You are a pharmaceutical research analyst. Summarize only what the text states; " +
  "do not invent results, figures or citations. Answer in Markdown.";

const instructions: Record<SummaryMode, { task: string; format: string }> = {
  concise: {
    task: "Analyze this pharmaceutical research paper excerpt and provide a concise technical summary.",
    format: [
      "# Summary: [Paper Title]",
      "## Key Findings",
      "- [3-5 bullet points of main results]",
      "## Methodology",
      "- [Brief description of methods used]",
      "## Significance",
      "- [Why this research matters]"
    ].join("\n")
  },
  detailed: {
    task: "Write a detailed section-by-section summary of this pharmaceutical research paper excerpt.",
    format: [
      "# Detailed Summary: [Paper Title]",
      "## Background",
      "[Problem and prior work]",
      "## Methods",
      "- [Materials, conditions, instruments]",
      "## Results",
      "- [Each reported result with its figures]",
      "## Limitations",
      "- [Stated or evident limitations]",
      "## Conclusions",
      "[Authors' conclusions]"
    ].join("\n")
  },
  teaching: {
    task: "Convert this pharmaceutical research into a student-friendly summary suitable for undergraduate chemistry students.",
    format: [
      "# Student-Friendly Summary",
      "## What The Scientists Did",
      "[Simple explanation in plain English]",
      "## Why This Matters",
      "- [Practical implications]",
      "## Simple Chemistry Explanation",
      "[Break down complex concepts with analogies]",
      "## Real-World Impact",
      "[How this affects people's lives]"
    ].join("\n")
  },
  key_findings: {
    task: "Extract the key findings and technical details from this pharmaceutical research.",
    format: [
      "## Key Research Findings",
      "### Main Results",
      "1. [Numbered list of results]",
      "### Technical Details",
      "- [Specific parameters, conditions, measurements]",
      "### Industrial Implications",
      "- [Business and commercial impact]"
    ].join("\n")
  }
};

export const truncateInput = (text: string, maxChars: number): { text: string; truncated: boolean } =>
  text.length > maxChars
    ? { text: text.slice(0, maxChars), truncated: true }
    : { text, truncated: false };

export const buildSummaryPrompt = (
  text: string,
  mode: SummaryMode,
  maxInputChars: number
): SummaryPrompt => {
  const excerpt = truncateInput(text.trim(), maxInputChars);
  const { task, format } = instructions[mode];
  return {
    mode,
    system: SYSTEM_PROMPT,
    user: `${task}\n\nResearch Text:\n${excerpt.text}\n\nFormat your response as:\n${format}`,
    inputChars: text.trim().length,
    truncated: excerpt.truncated
  };
};
