import { CorrectionRecord } from './types';

const MAX_EXAMPLE_CHARS = 200;

function clip(text: string): string {
  return text.length > MAX_EXAMPLE_CHARS ? `${text.slice(0, MAX_EXAMPLE_CHARS)}...` : text;
}

/**
 * Instruction block showing recent human corrections for a category.
 * Undefined when there is nothing to show.
 */
export function buildFewShotBlock(corrections: CorrectionRecord[]): string | undefined {
  if (corrections.length === 0) return undefined;

  const lines = [
    'LEARNING FROM PAST CORRECTIONS:',
    'These earlier replies were corrected by support agents. Avoid repeating the same mistakes.',
  ];
  corrections.forEach((c, i) => {
    lines.push(
      '',
      `Example ${i + 1} (${c.correctionType}):`,
      `  Issue: ${c.issue ?? 'Not specified'}`,
      `  Original: ${clip(c.aiResponse)}`,
      `  Corrected: ${clip(c.humanEdit)}`,
    );
  });
  return lines.join('\n');
}
