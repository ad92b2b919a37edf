export interface WritingStyle {
  readonly tone: string;
  readonly audience: string;
  readonly contentType: string;
  readonly language: string;
  readonly outputFormat: string;
  /** Target length in words */
  readonly targetLength: number;
}

export const DEFAULT_WRITING_STYLE: WritingStyle = {
  tone: "Professional",
  audience: "Professional",
  contentType: "Informational",
  language: "English",
  outputFormat: "markdown",
  targetLength: 2000,
};

/**
 * System prompt for the content-writer persona, parameterized by style.
 */
export function buildContentWriterPrompt(style: Partial<WritingStyle> = {}): string {
  const s = { ...DEFAULT_WRITING_STYLE, ...style };
  return `You are a highly skilled content writer with a knack for creating engaging and informative content.
Your expertise spans various writing styles and formats.

Writing Style Guidelines:
- Tone: ${s.tone}
- Target Audience: ${s.audience}
- Content Type: ${s.contentType}
- Language: ${s.language}
- Output Format: ${s.outputFormat}
- Target Length: ${s.targetLength} words

Please provide responses that are:
- Well-structured and easy to read
- Engaging and informative
- Tailored to the specified tone and audience
- Professional yet accessible
- Optimized for the target content type`;
}

export const DEFAULT_SYSTEM_PROMPT = buildContentWriterPrompt();
