import { describe, it, expect, vi, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import winston from 'winston';
import { auditLog, enableAuditLog, logger } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should add one file transport per audit path', () => {
    const add = vi.spyOn(logger, 'add').mockReturnValue(logger);

    const filename = join(tmpdir(), 'wechat-bot-audit.log');

    enableAuditLog(filename);
    enableAuditLog(filename);

    expect(add).toHaveBeenCalledTimes(1);
    const [transport] = add.mock.calls[0];
    expect(transport).toBeInstanceOf(winston.transports.File);
    expect(transport.level).toBe('info');
  });

  it('should log audit entries at info', () => {
    const info = vi.spyOn(logger, 'info').mockReturnValue(logger);

    auditLog({ plugin: 'fastgpt', route: 'chat', chatId: 'c', senderId: 's', trigger: 'fastgpt', query: 'q' });

    expect(info).toHaveBeenCalledWith('Command executed', {
      type: 'audit',
      plugin: 'fastgpt',
      route: 'chat',
      chatId: 'c',
      senderId: 's',
      trigger: 'fastgpt',
      query: 'q',
    });
  });
});
