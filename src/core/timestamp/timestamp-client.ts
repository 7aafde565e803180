import { Logger } from '@nestjs/common';
import { DigestAlgorithm, DIGEST_ALGORITHM_OIDS } from '../domain/enums';
import {
  TimestampAuthority,
  TimestampTransportError,
} from '../interfaces';
import { TimestampRequestError } from '../pipeline/types';
import { computeDigest } from './digest';
import {
  TimeStampReply,
  TimestampTokenInfo,
  decodeTimeStampResponse,
  describeRefusal,
  encodeTimeStampRequest,
  isGranted,
  randomNonce,
  readTimestampToken,
} from './rfc3161';
import { TsaProfile } from './tsa-profile';
import { TokenVerifier } from './token-verifier';
import {
  DEFAULT_RETRY_POLICY,
  RetryPolicy,
  retryDelay,
  sleep as defaultSleep,
} from './retry-policy';

/**
 * A granted token together with what was checked against it
 */
export interface TimestampReceipt {
  token: Buffer;
  digest: Buffer;
  algorithm: DigestAlgorithm;
  genTime: Date;
  serialNumber: string;
  policy: string;
  attempts: number;
}

export interface TimestampClientOptions {
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Timestamp client
 *
 * Obtains an RFC 3161 token over a payload's digest from the configured TSA.
 * Only transport failures are retried; a refusal or an unusable reply fails
 * at once. A granted token must verify against the trust anchors before it
 * is handed back.
 */
export class TimestampClient {
  private readonly logger = new Logger(TimestampClient.name);
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly verifier: TokenVerifier;

  constructor(
    private readonly authority: TimestampAuthority,
    private readonly profile: TsaProfile,
    options: TimestampClientOptions = {},
  ) {
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? defaultSleep;
    this.verifier = new TokenVerifier(profile);
  }

  get digestAlgorithm(): DigestAlgorithm {
    return this.profile.digestAlgorithm;
  }

  async requestTimestamp(payloadBytes: Buffer): Promise<TimestampReceipt> {
    const algorithm = this.profile.digestAlgorithm;
    const digest = computeDigest(algorithm, payloadBytes);
    const nonce = randomNonce();
    const request = encodeTimeStampRequest({
      algorithm,
      digest,
      nonce,
      certReq: true,
      policyId: this.profile.policyId,
    });

    const { response, attempts } = await this.exchange(request);

    let reply: TimeStampReply;
    try {
      reply = decodeTimeStampResponse(response);
    } catch (error) {
      throw new TimestampRequestError(
        `Reply from ${this.authority.name} is not a TimeStampResp`,
        'malformed',
        attempts,
        asError(error),
      );
    }

    if (!isGranted(reply)) {
      throw new TimestampRequestError(
        `Timestamp request refused (${describeRefusal(reply)})`,
        'rejected',
        attempts,
      );
    }

    if (!reply.token) {
      throw new TimestampRequestError(
        'Granted reply carries no timestamp token',
        'malformed',
        attempts,
      );
    }

    let info: TimestampTokenInfo;
    try {
      info = readTimestampToken(reply.token);
    } catch (error) {
      throw new TimestampRequestError(
        'Timestamp token could not be decoded',
        'malformed',
        attempts,
        asError(error),
      );
    }

    if (
      info.hashAlgorithmOid !== DIGEST_ALGORITHM_OIDS[algorithm] ||
      !info.messageImprint.equals(digest)
    ) {
      throw new TimestampRequestError(
        'Token message imprint does not match the request',
        'mismatch',
        attempts,
      );
    }

    if (!info.nonce || !info.nonce.equals(nonce)) {
      throw new TimestampRequestError(
        'Token nonce does not match the request',
        'mismatch',
        attempts,
      );
    }

    const verification = await this.verifier.verify(reply.token, payloadBytes);
    if (!verification.valid) {
      throw new TimestampRequestError(
        `Token from ${this.authority.name} failed verification: ${verification.reason}`,
        'untrusted',
        attempts,
      );
    }

    return {
      token: reply.token,
      digest,
      algorithm,
      genTime: info.genTime,
      serialNumber: info.serialNumber,
      policy: info.policy,
      attempts,
    };
  }

  private async exchange(
    request: Buffer,
  ): Promise<{ response: Buffer; attempts: number }> {
    let lastError: Error | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      attempts = attempt;
      if (attempt > 1) {
        await this.sleep(retryDelay(this.retry, attempt));
      }

      try {
        const response = await this.authority.exchange(request);
        return { response, attempts: attempt };
      } catch (error) {
        lastError = asError(error);
        if (!(error instanceof TimestampTransportError)) {
          break;
        }
        this.logger.warn(
          `TSA exchange attempt ${attempt}/${this.retry.maxAttempts} failed: ${lastError.message}`,
        );
      }
    }

    throw new TimestampRequestError(
      `Could not reach ${this.authority.name}: ${lastError?.message ?? 'no attempts made'}`,
      'transport',
      attempts,
      lastError,
    );
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
