import type { CommandOutcome, RecallHost, RecallInvocation } from '../types';
import type { RecallCoordinator } from '../recall/recall-coordinator';

const RECALL_COMMAND_PATTERN = /^\/(?:recall|отозвать)(?:@[a-z0-9_]+)?(?:\s+(\S+))?$/iu;

export interface ParsedRecallCommand {
  messageId?: string;
}

export function parseRecallCommand(text: string): ParsedRecallCommand | null {
  const match = text.trim().match(RECALL_COMMAND_PATTERN);
  if (!match) return null;

  const messageId = match[1]?.trim();
  return messageId ? { messageId } : {};
}

export class RecallCommand {
  constructor(private readonly coordinator: RecallCoordinator) {}

  /**
   * Returns null when the text is not a recall command, so the caller can
   * hand the message to the next handler.
   */
  async tryHandle(text: string, invocation: RecallInvocation, host: RecallHost): Promise<CommandOutcome | null> {
    const parsed = parseRecallCommand(text);
    if (!parsed) return null;

    return this.coordinator.runCommand(invocation, host, parsed.messageId);
  }
}
