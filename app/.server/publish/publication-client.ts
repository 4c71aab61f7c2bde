import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { PublicationCredentials, PublicationDraft } from '~/types/hash-publication';
import { hexToBytes, isSha256Hex } from '~/.server/crypto/hash';
import { PublicationError } from '~/.server/errors';
import { getLogger } from '~/.server/log/logger';

const log = getLogger({ module: 'PublicationClient' });

export const GIST_ENDPOINT = 'https://api.github.com/gists';
export const OPEN_TIMESTAMPS_ENDPOINT = 'https://opentimestamps.org/api/v1/timestamp';
export const GIST_FILE_NAME = 'transcript_hash.txt';

const GistResponseSchema = z.object({
  html_url: z.string(),
});

export interface PublicationClientOptions {
  fetch?: typeof fetch;
  now?: () => Date;
}

export function renderGistContent(hash: string, title: string, timestamp: string): string {
  return [
    '# AI Chat Transcript Hash',
    `Title: ${title}`,
    `SHA-256: ${hash}`,
    `Timestamp: ${timestamp}`,
    '',
    'This hash cryptographically proves the existence and content of an AI chat transcript at this timestamp.',
  ].join('\n');
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Submits transcript hashes to external proof-of-existence services.
 *
 * One outbound request per call, no retries. A failed call throws
 * PublicationError and returns nothing, so the caller records nothing.
 */
export class PublicationClient {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(options: PublicationClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async publish(hash: string, title: string, credentials: PublicationCredentials): Promise<PublicationDraft> {
    if (!isSha256Hex(hash)) {
      throw new PublicationError('invalid-hash');
    }

    switch (credentials.service) {
      case 'github-gist':
        return this.publishToGist(hash, title, credentials.token);
      case 'open-timestamps':
        return this.publishToOpenTimestamps(hash);
      case 'custom-webhook':
        return this.publishToWebhook(hash, title, credentials.url);
    }
  }

  private async publishToGist(hash: string, title: string, token: string): Promise<PublicationDraft> {
    if (!token) {
      throw new PublicationError('unauthorized', { detail: 'GitHub token is empty' });
    }

    const publishedAt = this.now().toISOString();
    const response = await this.send(GIST_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify({
        description: `AI Chat Transcript Hash - ${title}`,
        public: true,
        files: {
          [GIST_FILE_NAME]: { content: renderGistContent(hash, title, publishedAt) },
        },
      }),
    });

    if (response.status === 401 || response.status === 403) {
      throw new PublicationError('unauthorized', { status: response.status });
    }
    await this.ensureOk(response, 'github-gist');

    const parsed = GistResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new PublicationError('request-failed', { detail: 'GitHub response has no html_url' });
    }

    log.info({ service: 'github-gist', url: parsed.data.html_url }, 'hash published');

    return {
      id: randomUUID(),
      service: 'github-gist',
      publishedAt,
      publicUrl: parsed.data.html_url,
      transactionId: null,
      confirmationStatus: 'confirmed',
      errorMessage: null,
    };
  }

  private async publishToOpenTimestamps(hash: string): Promise<PublicationDraft> {
    const digest = hexToBytes(hash);
    if (!digest) {
      throw new PublicationError('invalid-hash');
    }

    const publishedAt = this.now().toISOString();
    const response = await this.send(OPEN_TIMESTAMPS_ENDPOINT, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: digest,
    });
    await this.ensureOk(response, 'open-timestamps');

    const proof = Buffer.from(await response.arrayBuffer()).toString('base64');
    log.info({ service: 'open-timestamps', proofBytes: proof.length }, 'hash submitted for timestamping');

    return {
      id: randomUUID(),
      service: 'open-timestamps',
      publishedAt,
      publicUrl: null,
      transactionId: proof,
      confirmationStatus: 'pending',
      errorMessage: null,
    };
  }

  private async publishToWebhook(hash: string, title: string, url: string): Promise<PublicationDraft> {
    if (!isHttpUrl(url)) {
      throw new PublicationError('invalid-url', { detail: url });
    }

    const publishedAt = this.now().toISOString();
    const response = await this.send(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        title,
        hash,
        timestamp: publishedAt,
        algorithm: 'SHA-256',
      }),
    });
    await this.ensureOk(response, 'custom-webhook');

    log.info({ service: 'custom-webhook', url }, 'hash published');

    return {
      id: randomUUID(),
      service: 'custom-webhook',
      publishedAt,
      publicUrl: url,
      transactionId: null,
      confirmationStatus: 'confirmed',
      errorMessage: null,
    };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      log.warn({ url, err: error }, 'publication request failed');
      throw new PublicationError('request-failed', { cause: error });
    }
  }

  private async ensureOk(response: Response, service: string): Promise<void> {
    if (response.ok) {
      return;
    }
    const errorText = await response.text().catch(() => '');
    log.warn({ service, status: response.status, body: errorText.substring(0, 200) }, 'publication rejected');
    throw new PublicationError('request-failed', {
      status: response.status,
      detail: `${service} returned ${response.status}`,
    });
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new PublicationError('request-failed', { cause: error, detail: 'response is not JSON' });
    }
  }
}
