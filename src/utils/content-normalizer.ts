// Chat models wrap their JSON in assorted noise. Each pass removes one kind
// of wrapper; they run in order over the trimmed content.

export type NormalizationPass = (content: string) => string;

export const stripThinkBlocks: NormalizationPass = (content) =>
  content.replace(/<think>[\s\S]*?<\/think>/g, '').trim();

export const stripTemperaturePrefix: NormalizationPass = (content) =>
  content.startsWith('temperature:')
    ? content.slice('temperature:'.length).trim()
    : content;

export const stripCodeFence: NormalizationPass = (content) => {
  let out = content;
  if (out.startsWith('```json')) {
    out = out.slice(7);
  } else if (out.startsWith('```')) {
    out = out.slice(3);
  }
  if (out.endsWith('```')) {
    out = out.slice(0, -3);
  }
  return out.trim();
};

export const NORMALIZATION_PASSES: readonly NormalizationPass[] = [
  stripThinkBlocks,
  stripTemperaturePrefix,
  stripCodeFence,
];

export function normalizeContent(
  raw: string,
  passes: readonly NormalizationPass[] = NORMALIZATION_PASSES,
): string {
  return passes.reduce((content, pass) => pass(content), raw.trim());
}
