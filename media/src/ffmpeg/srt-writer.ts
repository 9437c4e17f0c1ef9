import type { PlanSubtitleCue, SubtitleStyle } from '@timeweave/core';

/**
 * Format seconds as an SRT timestamp, `HH:MM:SS,mmm`.
 */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;

  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(millis, 3)}`;
}

/**
 * Render cues as an SRT document. Cues are written in the order given,
 * numbered by their plan index.
 */
export function renderSrt(cues: readonly PlanSubtitleCue[]): string {
  return cues
    .map((cue) =>
      [
        String(cue.index),
        `${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}`,
        applyStyle(cue.text, cue.style),
        '',
      ].join('\n'),
    )
    .join('\n');
}

/**
 * Styles map to the tags libass understands inside SRT: `{\an8}` / `{\an5}`
 * for placement, `<font>` for size and colour.
 */
function applyStyle(text: string, style: SubtitleStyle | undefined): string {
  if (!style) {
    return text;
  }

  let styled = text;
  const attributes: string[] = [];
  if (style.fontColor) {
    attributes.push(`color="${style.fontColor}"`);
  }
  if (style.fontSize !== undefined) {
    attributes.push(`size="${style.fontSize}"`);
  }
  if (attributes.length > 0) {
    styled = `<font ${attributes.join(' ')}>${styled}</font>`;
  }

  if (style.position === 'top') {
    styled = `{\\an8}${styled}`;
  } else if (style.position === 'middle') {
    styled = `{\\an5}${styled}`;
  }
  return styled;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
