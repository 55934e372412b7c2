/**
 * Text rendering for the interactive console.
 */

import type { HookOptions, StructureOutline } from '../bundle/types.js';
import { FOCUS_AREAS } from '../conversation/focus-areas.js';
import { countUserTurns } from '../conversation/machine.js';
import type { Session } from '../conversation/types.js';

/**
 * Status line block shown for `/status`.
 */
export function formatSessionStatus(session: Session): string {
  const covered = session.coveredFocusAreas;
  const open = FOCUS_AREAS.filter((area) => !covered.includes(area));
  return [
    `Session ${session.id}: ${session.state}`,
    `  Replies: ${String(countUserTurns(session))}`,
    `  Covered (${String(covered.length)}/${String(FOCUS_AREAS.length)}): ${covered.join(', ') || 'none'}`,
    `  Still open: ${open.join(', ') || 'none'}`,
  ].join('\n');
}

/**
 * Outline shown for approval, with the chosen hook spelled out.
 */
export function formatOutline(outline: StructureOutline, hooks: HookOptions | undefined): string {
  const hook = hooks?.options[outline.selectedHookIndex];
  const lines = [
    `Format: ${outline.format}`,
    `Hook: ${hook !== undefined ? hook.text : `#${String(outline.selectedHookIndex)}`}`,
  ];
  outline.sections.forEach((section, index) => {
    lines.push(`${String(index + 1)}. ${section.heading} (${section.purpose})`);
    for (const point of section.points) {
      lines.push(`   - ${point}`);
    }
  });
  if (outline.callToAction !== undefined) {
    lines.push(`Call to action: ${outline.callToAction}`);
  }
  return lines.join('\n');
}
