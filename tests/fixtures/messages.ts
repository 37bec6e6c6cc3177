import type { FakeMessage } from './FakeMailbox.js';

export interface AttachmentSpec {
  /** Raw Content-Disposition parameter, e.g. filename="report.pdf" */
  filenameParameter: string;
  content: string;
  disposition?: 'attachment' | 'inline';
  contentType?: string;
}

export interface MessageSpec {
  subject?: string;
  body?: string;
  attachments?: AttachmentSpec[];
}

const BOUNDARY = 'archive-test-boundary';

/**
 * Builds a CRLF-delimited RFC 822 message. Attachments make it multipart/mixed.
 */
export function buildRawMessage(spec: MessageSpec = {}): Buffer {
  const headers = [
    'From: Sender <sender@example.com>',
    'To: Archive <archive@example.com>',
    'Date: Mon, 15 Jan 2024 10:30:00 +0000',
    'Message-ID: <test-message@example.com>',
    'MIME-Version: 1.0',
  ];
  if (spec.subject !== undefined) {
    headers.push(`Subject: ${spec.subject}`);
  }

  const body = spec.body ?? 'Hello from the test suite.';
  const attachments = spec.attachments ?? [];

  if (attachments.length === 0) {
    headers.push('Content-Type: text/plain; charset=utf-8');
    return Buffer.from([...headers, '', body, ''].join('\r\n'));
  }

  headers.push(`Content-Type: multipart/mixed; boundary="${BOUNDARY}"`);
  const lines = [...headers, '', `--${BOUNDARY}`, 'Content-Type: text/plain; charset=utf-8', '', body];

  for (const attachment of attachments) {
    lines.push(
      `--${BOUNDARY}`,
      `Content-Type: ${attachment.contentType ?? 'application/octet-stream'}`,
      `Content-Disposition: ${attachment.disposition ?? 'attachment'}; ${attachment.filenameParameter}`,
      'Content-Transfer-Encoding: base64',
      '',
      Buffer.from(attachment.content).toString('base64')
    );
  }
  lines.push(`--${BOUNDARY}--`, '');

  return Buffer.from(lines.join('\r\n'));
}

export function fakeMessage(uid: number, internalDate: string, spec: MessageSpec = {}): FakeMessage {
  return { uid, internalDate: new Date(internalDate), raw: buildRawMessage(spec) };
}
