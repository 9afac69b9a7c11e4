import { describe, it, expect, vi } from 'vitest';
import { Mailer } from '../../src/infrastructure/notifications/mailer.js';
import type { MailerHost } from '../../src/infrastructure/notifications/mailer.js';
import { createLoggingTransport } from '../../src/infrastructure/notifications/email-transport.js';
import type { MailTransport } from '../../src/infrastructure/notifications/email-transport.js';
import { VALID_EMAIL_CONFIG, fakeLogger, fakeRecorder } from '../helpers/fakes.js';

function fakeHost() {
  return {
    ...fakeRecorder(),
    getLogfile: () => 'run_test.log',
    getLogPath: () => '/tmp/run-notifier/run_test.log',
  } satisfies MailerHost;
}

function fakeTransport() {
  return { send: vi.fn().mockResolvedValue(undefined) } satisfies MailTransport;
}

describe('Mailer construction', () => {
  it('accepts a complete config without reporting anything', () => {
    const host = fakeHost();
    const mailer = new Mailer(VALID_EMAIL_CONFIG, host, fakeTransport());

    expect(mailer.criticalErrorCount).toBe(0);
    expect(host.critical).not.toHaveBeenCalled();
    expect(mailer.recipients).toEqual(['ops@example.com', 'dev@example.com']);
  });

  it('reports every missing key as a critical event', () => {
    const host = fakeHost();
    const mailer = new Mailer({ sender: 'robot@example.com' }, host, fakeTransport());

    expect(mailer.criticalErrorCount).toBe(4);
    expect(host.critical).toHaveBeenCalledWith(
      'Getting email config',
      "Missing keyword 'receiver' in email config.",
    );
    expect(host.critical).toHaveBeenCalledWith(
      'Getting email config',
      "Missing keyword 'smtp-server' in email config.",
    );
  });

  it('reports a non-numeric port as invalid', () => {
    const host = fakeHost();
    const mailer = new Mailer({ ...VALID_EMAIL_CONFIG, port: 'smtp' }, host, fakeTransport());

    expect(mailer.criticalErrorCount).toBe(1);
    expect(host.critical).toHaveBeenCalledWith('Getting email config', "Keyword 'port' is not valid.");
  });

  it('rejects a receiver list without any address', () => {
    const host = fakeHost();
    const mailer = new Mailer({ ...VALID_EMAIL_CONFIG, receiver: ' , ' }, host, fakeTransport());

    expect(mailer.criticalErrorCount).toBe(1);
    expect(host.critical).toHaveBeenCalledWith(
      'Getting email config',
      "Keyword 'receiver' is not valid.",
    );
    expect(mailer.recipients).toEqual([]);
  });

  it('never records warnings or errors itself', () => {
    const host = fakeHost();
    new Mailer({}, host, fakeTransport());

    expect(host.warning).not.toHaveBeenCalled();
    expect(host.error).not.toHaveBeenCalled();
  });
});

describe('Mailer content', () => {
  it('formats content lines as time - LEVEL - text', () => {
    const mailer = new Mailer(VALID_EMAIL_CONFIG, fakeHost(), fakeTransport());
    mailer.addContent('INFO', '"JSON read" occured properly.', '14:05:09');
    mailer.addContent('WARNING', 'cleanup: slow', '14:05:10');

    expect(mailer.content).toEqual([
      '14:05:09 - INFO - "JSON read" occured properly.',
      '14:05:10 - WARNING - cleanup: slow',
    ]);
  });

  it('builds the message with the log file attached', () => {
    const mailer = new Mailer(VALID_EMAIL_CONFIG, fakeHost(), fakeTransport());
    mailer.addContent('INFO', 'a', '10:00:00');
    mailer.addContent('INFO', 'b', '10:00:01');

    expect(mailer.buildMessage()).toEqual({
      server: { host: 'smtp.example.com', port: 587 },
      auth: { user: 'robot@example.com', pass: 'test-secret' },
      from: 'robot@example.com',
      to: ['ops@example.com', 'dev@example.com'],
      subject: 'Task report',
      text: '10:00:00 - INFO - a\n10:00:01 - INFO - b',
      attachments: [{ filename: 'run_test.log', path: '/tmp/run-notifier/run_test.log' }],
    });
  });

  it('flags the subject once an error line was added', () => {
    const mailer = new Mailer(
      { ...VALID_EMAIL_CONFIG, subject: 'Nightly import' },
      fakeHost(),
      fakeTransport(),
    );
    mailer.addContent('ERROR', 'send file: disk full', '10:00:00');

    expect(mailer.buildMessage().subject).toBe('Nightly import - errors');
  });

  it('refuses to build a message from an invalid config', () => {
    const mailer = new Mailer({}, fakeHost(), fakeTransport());
    expect(() => mailer.buildMessage()).toThrow('Email config is not valid');
  });
});

describe('Mailer.sendEmail', () => {
  it('hands the message to the transport and records the delivery', async () => {
    const host = fakeHost();
    const transport = fakeTransport();
    const mailer = new Mailer(VALID_EMAIL_CONFIG, host, transport);

    await mailer.sendEmail();

    expect(transport.send).toHaveBeenCalledOnce();
    expect(transport.send).toHaveBeenCalledWith(
      expect.objectContaining({ to: ['ops@example.com', 'dev@example.com'] }),
    );
    expect(host.info).toHaveBeenCalledWith(
      'Send email',
      'Email sent to ops@example.com, dev@example.com.',
    );
  });

  it('propagates transport failures without recording a delivery', async () => {
    const host = fakeHost();
    const transport = { send: vi.fn().mockRejectedValue(new Error('connection refused')) };
    const mailer = new Mailer(VALID_EMAIL_CONFIG, host, transport);

    await expect(mailer.sendEmail()).rejects.toThrow('connection refused');
    expect(host.info).not.toHaveBeenCalled();
  });
});

describe('createLoggingTransport', () => {
  it('logs a structured entry without credentials', async () => {
    const log = fakeLogger();
    const mailer = new Mailer(VALID_EMAIL_CONFIG, fakeHost(), createLoggingTransport(log));
    mailer.addContent('INFO', 'a', '10:00:00');

    await mailer.sendEmail();

    expect(log.info).toHaveBeenCalledWith(
      {
        smtp_host: 'smtp.example.com',
        smtp_port: 587,
        from: 'robot@example.com',
        recipients: ['ops@example.com', 'dev@example.com'],
        subject: 'Task report',
        lines: 1,
        attachments: ['run_test.log'],
      },
      'Email notification (stub), SMTP not implemented',
    );
  });
});
