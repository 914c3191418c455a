import { describe, expect, it, vi } from 'vitest';
import type { DeletePayload, HistoryRecord, RecallHost } from '../src/types';
import {
  classifyDeleteFailure,
  DeletionGateway,
  isDeleteResponseOk,
  NOTE_DELETE_FAILED,
  NOTE_NO_PERMISSION,
  NOTE_WINDOW_EXPIRED,
} from '../src/recall/deletion-gateway';

function makeLogger() {
  return {
    debug: vi.fn(async () => {}),
    info: vi.fn(async () => {}),
    warn: vi.fn(async () => {}),
    error: vi.fn(async () => {}),
  };
}

function makeHost() {
  const host = {
    sendText: vi.fn(async (_text: string) => {}),
    sendBackendCommand: vi.fn(
      async (_name: string, _payload: DeletePayload, _displayText: string, _persist: boolean): Promise<unknown> => ({ status: 'ok' }),
    ),
    getRecentMessages: vi.fn(async (): Promise<HistoryRecord[]> => []),
  } satisfies RecallHost;
  return host;
}

describe('delete response interpretation', () => {
  it('recognizes success shapes', () => {
    expect(isDeleteResponseOk(true)).toBe(true);
    expect(isDeleteResponseOk(false)).toBe(false);
    expect(isDeleteResponseOk({ status: 'Success' })).toBe(true);
    expect(isDeleteResponseOk({ status: 'OK' })).toBe(true);
    expect(isDeleteResponseOk({ retcode: 0 })).toBe(true);
    expect(isDeleteResponseOk({ code: 0 })).toBe(true);
    expect(isDeleteResponseOk({ retcode: '0' })).toBe(false);
    expect(isDeleteResponseOk('ok')).toBe(false);
    expect(isDeleteResponseOk(null)).toBe(false);
  });

  it('classifies failure text', () => {
    expect(classifyDeleteFailure({ msg: 'Permission denied' })).toBe(NOTE_NO_PERMISSION);
    expect(classifyDeleteFailure({ message: 'bot is not admin' })).toBe(NOTE_NO_PERMISSION);
    expect(classifyDeleteFailure({ message: 'Timeout' })).toBe(NOTE_WINDOW_EXPIRED);
    expect(classifyDeleteFailure({ message: 'something else' })).toBeNull();
    expect(classifyDeleteFailure(false)).toBeNull();
  });
});

describe('deletion gateway', () => {
  it('stops at the first command that succeeds', async () => {
    const gateway = new DeletionGateway(makeLogger());
    const host = makeHost();

    const result = await gateway.attemptDelete(host, '123', 'display');

    expect(result).toEqual({
      success: true,
      backendCommandUsed: 'DELETE_MSG',
      rawResponse: { status: 'ok' },
      diagnosticNote: '',
    });
    expect(host.sendBackendCommand).toHaveBeenCalledTimes(1);
    expect(host.sendBackendCommand).toHaveBeenCalledWith('DELETE_MSG', { message_id: '123' }, 'display', false);
  });

  it('tries the next command after a failure', async () => {
    const gateway = new DeletionGateway(makeLogger());
    const host = makeHost();
    host.sendBackendCommand
      .mockResolvedValueOnce({ status: 'failed', msg: 'no permission' })
      .mockResolvedValueOnce(true);

    const result = await gateway.attemptDelete(host, '123', 'display');

    expect(result.success).toBe(true);
    expect(result.backendCommandUsed).toBe('delete_msg');
    expect(result.diagnosticNote).toBe(NOTE_NO_PERMISSION);
    expect(host.sendBackendCommand.mock.calls.map((call) => call[0])).toEqual(['DELETE_MSG', 'delete_msg']);
  });

  it('keeps the last classified note when every command fails', async () => {
    const gateway = new DeletionGateway(makeLogger());
    const host = makeHost();
    host.sendBackendCommand
      .mockResolvedValueOnce({ status: 'failed', message: 'Not admin' })
      .mockResolvedValueOnce({ status: 'failed', msg: 'message expired' })
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce({ retcode: 1 });

    const result = await gateway.attemptDelete(host, '123', 'display');

    expect(result).toEqual({
      success: false,
      backendCommandUsed: 'recall_msg',
      rawResponse: { retcode: 1 },
      diagnosticNote: NOTE_WINDOW_EXPIRED,
    });
    expect(host.sendBackendCommand).toHaveBeenCalledTimes(4);
  });

  it('logs thrown commands and moves on', async () => {
    const logger = makeLogger();
    const gateway = new DeletionGateway(logger);
    const host = makeHost();
    host.sendBackendCommand
      .mockRejectedValueOnce(new Error('unknown action'))
      .mockResolvedValueOnce({ status: 'success' });

    const result = await gateway.attemptDelete(host, '123', 'display');

    expect(result.success).toBe(true);
    expect(result.backendCommandUsed).toBe('delete_msg');
    expect(logger.error).toHaveBeenCalledWith('Delete command failed', {
      command: 'DELETE_MSG',
      messageId: '123',
      error: 'unknown action',
    });
  });

  it('uses the generic note when nothing could be classified', async () => {
    const logger = makeLogger();
    const gateway = new DeletionGateway(logger);
    const host = makeHost();
    host.sendBackendCommand.mockRejectedValue(new Error('boom'));

    const result = await gateway.attemptDelete(host, '123', 'display');

    expect(result).toEqual({
      success: false,
      backendCommandUsed: 'recall_msg',
      rawResponse: null,
      diagnosticNote: NOTE_DELETE_FAILED,
    });
    expect(logger.error).toHaveBeenCalledTimes(4);
  });
});
