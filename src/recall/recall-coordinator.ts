import type {
  CommandOutcome,
  DeletionAttemptResult,
  RecallAuditSink,
  RecallHost,
  RecallInvocation,
  RecallOutcome,
  RecallStatus,
  RecallTrigger,
  VerificationResult,
} from '../types';
import type { SettingsReader } from '../config';
import { errorMessage, type RecallLogger } from '../services/logger';
import { sleep } from '../utils/time';
import { DeletionGateway } from './deletion-gateway';
import { isValidMessageId } from './identifier';
import { IdentifierResolver, pickChatId } from './identifier-resolver';
import { RecentRecallCache } from './recent-recall-cache';
import { TaskRegistry } from './task-registry';
import { VerificationProbe } from './verification-probe';

export const AFFIRMATIVE_VERDICT = 'yes';

export const DENIED_PRIVATE_CHAT = 'Удаление доступно только в групповых чатах';
export const DENIED_CHAT_NOT_ALLOWED = 'В этом чате нет прав на удаление сообщений';
export const FAILURE_NOTICE_PREFIX = 'Не удалось удалить сообщение';

const FALLBACK_ERROR_MESSAGE = 'Не найдено сообщение для удаления. Ответьте на него или укажите message_id.';

export interface RecallCoordinatorDeps {
  settings: SettingsReader;
  logger: RecallLogger;
  audit?: RecallAuditSink;
  now?: () => number;
  random?: () => number;
}

interface RecallRequest {
  trigger: RecallTrigger;
  invocation: RecallInvocation;
  host: RecallHost;
  explicitId?: string;
  verdict?: string;
}

interface DeletionRun {
  attempt: DeletionAttemptResult;
  verification: VerificationResult;
}

const UNCONFIRMED_REASONS = new Set<VerificationResult['reason']>(['skipped', 'skip_no_chat_id', 'verify_error']);

export class RecallCoordinator {
  readonly cache: RecentRecallCache;
  readonly tasks: TaskRegistry;
  readonly resolver: IdentifierResolver;
  readonly gateway: DeletionGateway;
  readonly probe: VerificationProbe;

  private readonly settings: SettingsReader;
  private readonly logger: RecallLogger;
  private readonly audit?: RecallAuditSink;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(deps: RecallCoordinatorDeps) {
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.audit = deps.audit;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;

    this.cache = new RecentRecallCache();
    this.tasks = new TaskRegistry(this.logger);
    this.resolver = new IdentifierResolver(this.logger);
    this.gateway = new DeletionGateway(this.logger);
    this.probe = new VerificationProbe(this.cache, this.logger, this.now);
  }

  /** Automatic trigger: acts only on an affirmative judgement verdict. */
  async runSmartRecall(invocation: RecallInvocation, host: RecallHost, verdict: string | undefined): Promise<RecallOutcome> {
    return this.guard({ trigger: 'smart', invocation, host, verdict });
  }

  /** Manual trigger: `/recall [id]`. The command message is always consumed. */
  async runCommand(invocation: RecallInvocation, host: RecallHost, explicitId?: string): Promise<CommandOutcome> {
    const outcome = await this.guard({ trigger: 'command', invocation, host, explicitId });
    return { ...outcome, intercepted: true };
  }

  async shutdown(): Promise<void> {
    await this.tasks.cancelAll();
  }

  private async guard(request: RecallRequest): Promise<RecallOutcome> {
    try {
      return await this.execute(request);
    } catch (error) {
      await this.logger.error('Recall workflow failed', {
        trigger: request.trigger,
        platform: request.invocation.platform,
        error: errorMessage(error),
      });
      return this.finish(request, { success: false, status: 'error', message: 'Внутренняя ошибка при удалении сообщения' });
    }
  }

  private async execute(request: RecallRequest): Promise<RecallOutcome> {
    const { trigger, invocation, host } = request;
    const explicitId = request.explicitId?.trim() || undefined;

    await this.logger.info('Recall requested', { trigger, platform: invocation.platform, groupId: invocation.groupId });

    const early = explicitId ?? this.resolver.resolveDirect(invocation);
    if (early && this.cache.has(early, this.now())) {
      return this.alreadyRecalled(request, early);
    }

    const denial = this.checkPermission(trigger, invocation);
    if (denial) {
      await this.notify(host, `❌ ${denial}`);
      return this.finish(request, { success: false, status: 'permission_denied', message: denial });
    }

    const target = explicitId ?? await this.resolver.resolve(invocation, host);
    if (!target) {
      await this.logger.warn('Target message id not found', { trigger });
      await this.notify(host, `❌ ${this.pickErrorMessage()}`);
      return this.finish(request, { success: false, status: 'unresolved', message: 'Не найдено сообщение для удаления' });
    }

    if (target !== early && this.cache.has(target, this.now())) {
      return this.alreadyRecalled(request, target);
    }

    if (!isValidMessageId(target, invocation.platform)) {
      await this.logger.error('Invalid message id for platform', { platform: invocation.platform, messageId: target });
      await this.notify(host, `❌ ${this.pickErrorMessage()}`);
      return this.finish(request, {
        success: false,
        status: 'invalid_target',
        message: `Некорректный message_id для платформы ${invocation.platform}`,
        messageId: target,
      });
    }

    if (trigger === 'smart' && request.verdict !== AFFIRMATIVE_VERDICT) {
      await this.logger.info('Judgement verdict is not affirmative, nothing to recall', {
        messageId: target,
        verdict: request.verdict ?? null,
      });
      return this.finish(request, {
        success: true,
        status: 'no_action',
        message: 'Удаление не требуется',
        messageId: target,
      });
    }

    return this.dispatch(request, target);
  }

  private async dispatch(request: RecallRequest, messageId: string): Promise<RecallOutcome> {
    const { host, invocation } = request;
    const displayText = this.settings.get('messages.recall_display');
    const delayMs = this.settings.get('behavior.recall_delay_ms');
    const chatId = pickChatId(invocation);

    if (delayMs <= 0) {
      const { attempt } = await this.deleteAndVerify(host, messageId, displayText, chatId);
      if (!attempt.success) {
        await this.notify(host, `❌ ${FAILURE_NOTICE_PREFIX}: ${attempt.diagnosticNote}`);
        return this.finish(request, {
          success: false,
          status: 'delete_failed',
          message: `${FAILURE_NOTICE_PREFIX} ${messageId} (${attempt.diagnosticNote})`,
          messageId,
        }, attempt.diagnosticNote);
      }

      return this.finish(request, {
        success: true,
        status: 'recalled',
        message: `Запрошено удаление сообщения ${messageId}`,
        messageId,
      }, attempt.backendCommandUsed);
    }

    this.tasks.spawn(`recall:${messageId}`, async (signal) => {
      await sleep(delayMs, signal);
      const { attempt } = await this.deleteAndVerify(host, messageId, displayText, chatId, signal);
      if (!attempt.success) {
        await this.notify(host, `❌ ${FAILURE_NOTICE_PREFIX}: ${attempt.diagnosticNote}`);
      }
      this.record(request, attempt.success ? 'recalled' : 'delete_failed', messageId, attempt.diagnosticNote || undefined);
    });

    await this.logger.info('Recall scheduled', { messageId, delayMs });
    return this.finish(request, {
      success: true,
      status: 'scheduled',
      message: `Удаление сообщения ${messageId} запланировано через ${delayMs} мс`,
      messageId,
    });
  }

  private async deleteAndVerify(
    host: RecallHost,
    messageId: string,
    displayText: string,
    chatId: string | null,
    signal?: AbortSignal,
  ): Promise<DeletionRun> {
    const attempt = await this.gateway.attemptDelete(host, messageId, displayText);
    const verification = await this.probe.verify(host, messageId, chatId, {
      enabled: this.settings.get('verify.enabled'),
      delayMs: this.settings.get('verify.delay_ms'),
      attempts: this.settings.get('verify.attempts'),
      signal,
    });

    await this.logger.debug('Recall attempt finished', {
      messageId,
      success: attempt.success,
      command: attempt.backendCommandUsed,
      verification: verification.reason,
    });

    // Verification marks the cache on confirmed removal; unverified successes are marked here.
    if (attempt.success && UNCONFIRMED_REASONS.has(verification.reason)) {
      this.cache.mark(messageId, this.now());
    }

    return { attempt, verification };
  }

  private checkPermission(trigger: RecallTrigger, invocation: RecallInvocation): string | null {
    if (trigger === 'smart' && !invocation.isGroup) {
      return DENIED_PRIVATE_CHAT;
    }

    const allowedGroups = this.settings.get('permissions.allowed_groups');
    if (allowedGroups.length === 0) {
      return null;
    }

    const groupKey = `${invocation.platform}:${invocation.groupId ?? ''}`;
    if (allowedGroups.includes(groupKey)) {
      return null;
    }

    void this.logger.warn('Chat is not in the recall whitelist', { groupKey });
    return DENIED_CHAT_NOT_ALLOWED;
  }

  private pickErrorMessage(): string {
    const messages = this.settings.get('messages.error_messages');
    if (messages.length === 0) {
      return FALLBACK_ERROR_MESSAGE;
    }

    const index = Math.min(messages.length - 1, Math.floor(this.random() * messages.length));
    return messages[index] ?? FALLBACK_ERROR_MESSAGE;
  }

  private async notify(host: RecallHost, text: string): Promise<void> {
    try {
      await host.sendText(text);
    } catch (error) {
      await this.logger.warn('Failed to send chat notice', { error: errorMessage(error) });
    }
  }

  private async alreadyRecalled(request: RecallRequest, messageId: string): Promise<RecallOutcome> {
    await this.logger.info('Message was recalled recently, skipping', { messageId });
    return this.finish(request, {
      success: true,
      status: 'already_recalled',
      message: `Сообщение ${messageId} уже удалено`,
      messageId,
    });
  }

  private finish(request: RecallRequest, outcome: RecallOutcome, note?: string): RecallOutcome {
    this.record(request, outcome.status, outcome.messageId, note);
    return outcome;
  }

  private record(request: RecallRequest, status: RecallStatus, messageId?: string, note?: string): void {
    if (!this.audit) return;

    try {
      this.audit.record({
        platform: request.invocation.platform,
        chatId: pickChatId(request.invocation) ?? undefined,
        messageId,
        trigger: request.trigger,
        status,
        note,
      });
    } catch (error) {
      void this.logger.warn('Failed to record recall audit entry', { status, error: errorMessage(error) });
    }
  }
}
