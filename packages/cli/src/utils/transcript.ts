import {
  DebateSummary,
  InterjectionEvent,
  ReactionEvent,
  SpeechEvent,
  StanceChangeEvent,
} from 'curia-core';

const INDENT = '  ';

/**
 * Plain-text transcript lines written to stdout. No colours, so output can be piped.
 */
export function formatSpeech(event: SpeechEvent): string {
  const lines = [
    '',
    `[${event.speaker.name} | ${event.speaker.faction} | ${event.stance}]`,
    `${INDENT}${event.content.original}`,
  ];
  if (event.content.translation) {
    lines.push(`${INDENT}(${event.content.translation})`);
  }
  if (event.keyPoints.length > 0) {
    lines.push(`${INDENT}Key points: ${event.keyPoints.join('; ')}`);
  }
  return lines.join('\n');
}

export function formatReaction(event: ReactionEvent): string {
  return `${INDENT}* ${event.reactor.name} ${event.content}`;
}

export function formatInterjection(event: InterjectionEvent): string {
  const marker = event.causesDisruption ? '!!' : '!';
  return `${INDENT}${marker} ${event.interjector.name} (${event.interjectionType}): "${event.content.original}" (${event.content.translation})`;
}

export function formatStanceChange(event: StanceChangeEvent): string {
  return `${INDENT}~ ${event.senator.name} moves from ${event.oldStance} to ${event.newStance} (${event.reason})`;
}

export function formatSummary(summary: DebateSummary): string {
  const counts = Object.entries(summary.speechCounts)
    .map(([name, count]) => `${name} ${count}`)
    .join(', ');
  return [
    '',
    `Debate ${summary.debateId} on "${summary.topic}" closed`,
    `${INDENT}Speeches: ${summary.totalSpeeches} (${counts})`,
    `${INDENT}Most active: ${summary.mostActiveSpeaker ?? 'none'}`,
    `${INDENT}Interjections: ${summary.interjections.allowed} allowed, ${summary.interjections.denied} denied`,
    `${INDENT}Reactions: ${summary.reactions}`,
    `${INDENT}Stance changes: ${summary.stanceChanges}`,
  ].join('\n');
}
