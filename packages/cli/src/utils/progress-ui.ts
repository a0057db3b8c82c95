import { DebateSummary, logMessage, MessageType, Senator } from 'curia-core';

/**
 * DebateProgressUI reports debate progress on stderr, keeping stdout for the transcript.
 *
 * Output is append-only: one line per event, prefixed with the speech counter
 * once the first speaker has the floor.
 */
export class DebateProgressUI {
  private totalSpeakers = 0;
  private currentTurn = 0;

  initialize(totalSpeakers: number): void {
    this.totalSpeakers = totalSpeakers;
    this.currentTurn = 0;
  }

  debateStarted(topic: string, participants: readonly Senator[]): void {
    this.appendMessage(`Debate on "${topic}" opened with ${participants.length} senators`, MessageType.INFO);
  }

  speakerRecognized(speaker: Senator): void {
    this.currentTurn++;
    this.appendMessage(this.formatMessageWithTurn(`${speaker.name} has the floor`), MessageType.INFO);
  }

  speechFailed(speaker: Senator, error: Error): void {
    this.appendMessage(this.formatMessageWithTurn(`${speaker.name} could not speak: ${error.message}`), MessageType.WARNING);
  }

  complete(summary: DebateSummary): void {
    this.currentTurn = 0;
    this.appendMessage(
      `Debate completed: ${summary.totalSpeeches} speeches, ${summary.reactions} reactions, ` +
        `${summary.interjections.allowed} interjections allowed, ${summary.interjections.denied} denied`,
      MessageType.SUCCESS
    );
  }

  private formatMessageWithTurn(message: string): string {
    if (this.currentTurn > 0) {
      return `[Speech ${this.currentTurn}/${this.totalSpeakers}] ${message}`;
    }
    return message;
  }

  private appendMessage(message: string, type: MessageType = MessageType.INFO): void {
    logMessage(message, type);
  }
}
