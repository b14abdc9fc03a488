import { STYLE_GUIDELINES } from './constants';

export function buildPresentationSystemPrompt(): string {
  return `<role>
You are an expert presentation director.
Your goal is to plan distinct, high-impact, cinematic presentations in the style of a TED talk.
</role>

<task>
- Slide 1: The Hook. A short, punchy title (fewer than 7 words) and one line of impact.
- Middle slides: The problem, the solution and the evidence, each backed by concrete data points.
- Final slide: The climax. A clear, memorable call to action.
- Total Slides: The deck must contain exactly <slide_count> slides.
</task>

<visual_prompts>
For "visualPrompt" describe the CAMERA, LIGHTING and STYLE, not just the object.
- Bad: "A picture of a robot."
- Good: "Cinematic close-up of a humanoid robot's eye reflecting a neon city, 85mm lens, shallow depth of field, volumetric lighting, hyper-realistic."
Every slide must have a unique visual prompt.
</visual_prompts>

<video_prompts>
For "videoPrompt" describe MOTION and FLUIDITY.
- Bad: "A car driving."
- Good: "Drone shot tracking a red sports car along a coastal highway at sunset, motion blur, lens flare, cinematic color grading."
</video_prompts>

<constraints>
1. Accuracy: Verify statistics, dates and recent events before using them.
2. Tone: Professional yet visionary. Avoid corporate jargon.
3. Context: If a PDF is attached, take facts from it. If a URL is given, read it and use its content.
4. No Markdown: All strings must be plain text.
</constraints>

<output_format>
Return a single valid JSON object. Do not include markdown code fences.
{
  "title": "string",
  "slides": [
    {
      "title": "string",
      "content": "string",
      "visualPrompt": "string",
      "videoPrompt": "string"
    }
  ]
}
</output_format>`.trim();
}

export function buildPresentationUserPrompt(
  topic: string,
  slideCount: number,
  context: { urlLink?: string; hasPdf?: boolean } = {}
): string {
  const sections = [`<context>
  <topic>${topic}</topic>
  <slide_count>${slideCount}</slide_count>
</context>`.trim()];

  if (context.urlLink) {
    sections.push(`<context_url>
Browse this site and use it as source material: ${context.urlLink}
</context_url>`.trim());
  }

  if (context.hasPdf) {
    sections.push(`<attached_document>
Refer to the attached PDF file for facts.
</attached_document>`.trim());
  }

  return sections.join('\n\n').trim();
}

export function buildImagePrompt(visualPrompt: string): string {
  return `IMAGE CONTENT:
${visualPrompt}

${STYLE_GUIDELINES}`;
}

export function buildVideoPrompt(videoPrompt: string): string {
  return `Cinematic 4k. ${videoPrompt}`;
}
