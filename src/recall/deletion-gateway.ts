import type { DeletionAttemptResult, RecallHost } from '../types';
import { errorMessage, type RecallLogger } from '../services/logger';

export const DELETE_COMMAND_CANDIDATES = ['DELETE_MSG', 'delete_msg', 'RECALL_MSG', 'recall_msg'] as const;

export const NOTE_DELETE_FAILED = 'удаление не выполнено';
export const NOTE_NO_PERMISSION = 'вероятно, недостаточно прав (бот не администратор или не может удалять чужие сообщения)';
export const NOTE_WINDOW_EXPIRED = 'вероятно, истекло время, в течение которого сообщение можно удалить';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isDeleteResponseOk(response: unknown): boolean {
  if (typeof response === 'boolean') {
    return response;
  }

  if (!isRecord(response)) {
    return false;
  }

  const status = String(response.status ?? '').toLowerCase();
  return status === 'ok'
    || status === 'success'
    || response.retcode === 0
    || response.code === 0;
}

/**
 * Best-effort reading of a platform's free-text failure message. Advisory
 * only: wording differs between backends and this is allowed to be wrong.
 */
export function classifyDeleteFailure(response: unknown): string | null {
  if (!isRecord(response)) {
    return null;
  }

  const text = String(response.msg || response.message || '').toLowerCase();
  if (text.includes('permission') || text.includes('admin')) {
    return NOTE_NO_PERMISSION;
  }
  if (text.includes('time') || text.includes('expired')) {
    return NOTE_WINDOW_EXPIRED;
  }
  return null;
}

export class DeletionGateway {
  constructor(
    private readonly logger: RecallLogger,
    private readonly commands: readonly string[] = DELETE_COMMAND_CANDIDATES,
  ) {}

  async attemptDelete(host: RecallHost, messageId: string, displayText: string): Promise<DeletionAttemptResult> {
    let note = '';
    let lastResponse: unknown = null;

    for (const command of this.commands) {
      try {
        const response = await host.sendBackendCommand(
          command,
          { message_id: messageId },
          displayText,
          false,
        );
        lastResponse = response;

        if (isDeleteResponseOk(response)) {
          return {
            success: true,
            backendCommandUsed: command,
            rawResponse: response,
            diagnosticNote: note,
          };
        }

        note = classifyDeleteFailure(response) ?? note;
      } catch (error) {
        await this.logger.error('Delete command failed', {
          command,
          messageId,
          error: errorMessage(error),
        });
      }
    }

    return {
      success: false,
      backendCommandUsed: this.commands[this.commands.length - 1] ?? '',
      rawResponse: lastResponse,
      diagnosticNote: note || NOTE_DELETE_FAILED,
    };
  }
}
