import { Joiner, Splitter } from 'mailsplit';
import type { MimeChunk, MimeNode } from 'mailsplit';
import { simpleParser } from 'mailparser';
import type { Attachment, ParsedMail } from 'mailparser';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type { ExtractedAttachment, ParsedMessage } from '../types/index.js';

const MULTIPART_HEADER = /^content-type:\s*multipart\//i;
const FILENAME_PARAMETER = /;\s*filename\*?(?:\d+\*?)?\s*=/i;
const NAME_PARAMETER = /;\s*name\*?(?:\d+\*?)?\s*=/i;

// Carries the declared disposition of a part re-marked as an attachment
const DISPOSITION_MARKER = 'X-Archive-Disposition';

export const NO_SUBJECT = 'No Subject';

function mediaType(headerValue: string): string {
  return headerValue.split(';')[0].trim().toLowerCase();
}

/**
 * simpleParser folds inline text parts into the body even when they carry a
 * filename. Such parts are re-declared as attachments so they are listed.
 */
function markNamedInlineText(node: MimeNode): void {
  if (node.root) {
    return;
  }

  const contentType = node.headers.getFirst('content-type') || '';
  const disposition = node.headers.getFirst('content-disposition') || '';
  if (!mediaType(contentType).startsWith('text/') || mediaType(disposition) !== 'inline') {
    return;
  }
  if (!FILENAME_PARAMETER.test(disposition) && !NAME_PARAMETER.test(contentType)) {
    return;
  }

  node.headers.update('Content-Disposition', disposition.replace(/^\s*inline/i, 'attachment'));
  node.headers.add(DISPOSITION_MARKER, 'inline');
}

/**
 * Decodes raw RFC 822 bytes into the subject and the attachment parts
 * that the archive keeps beside email.raw.
 */
export class MessageParser {
  async parse(raw: Buffer): Promise<ParsedMessage> {
    const parsed = await simpleParser(await this.normalizeParts(raw), {
      skipHtmlToText: true,
      skipTextToHtml: true,
      skipImageLinks: true,
      skipTextLinks: true,
    });

    const isMultipart = this.isMultipart(parsed);

    return {
      subject: parsed.subject ?? NO_SUBJECT,
      isMultipart,
      // Single-part messages never yield attachments, even with a declared filename
      attachments: isMultipart ? this.extractAttachments(parsed.attachments) : [],
    };
  }

  private async normalizeParts(raw: Buffer): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const joiner = new Joiner();
    joiner.on('data', (chunk: Buffer) => chunks.push(chunk));

    await pipeline(
      Readable.from([raw]),
      new Splitter(),
      new Transform({
        objectMode: true,
        transform(chunk: MimeNode | MimeChunk, _encoding, callback) {
          if (chunk.type === 'node') {
            markNamedInlineText(chunk);
          }
          callback(null, chunk);
        },
      }),
      joiner
    );

    return Buffer.concat(chunks);
  }

  private isMultipart(parsed: ParsedMail): boolean {
    const contentType = parsed.headerLines.find((header) => header.key === 'content-type');
    return contentType !== undefined && MULTIPART_HEADER.test(contentType.line);
  }

  private extractAttachments(attachments: Attachment[]): ExtractedAttachment[] {
    const extracted: ExtractedAttachment[] = [];

    for (const attachment of attachments) {
      const disposition =
        attachment.headers.get(DISPOSITION_MARKER.toLowerCase()) === 'inline'
          ? 'inline'
          : attachment.contentDisposition;
      if (disposition !== 'attachment' && disposition !== 'inline') {
        continue;
      }
      if (!attachment.filename) {
        continue;
      }

      extracted.push({
        filename: attachment.filename,
        disposition,
        content: attachment.content,
      });
    }

    return extracted;
  }
}
