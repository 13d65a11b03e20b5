/**
 * @exsync/eas-sync - Transport
 *
 * Executes ActiveSync commands and EWS calls for one connection. Owns the
 * only built-in retry: a single NTLM negotiation after a 401. ActiveSync
 * bodies are WBXML on the wire and XML everywhere else.
 */

import { getLogger } from '@exsync/logger';

import { EasError, isEasError, getErrorMessage, toEasError } from '../interfaces/errors';
import { err, fail, ok } from '../interfaces/result';
import { buildEnvelope } from '../protocol/soap-builder';
import { WBXML_CONTENT_TYPE, decodeWbxml, encodeWbxml, isWbxml } from '../protocol/wbxml';
import { FALLBACK_VERSION, NATIVE_CAPABILITY_MAJOR, majorVersionOf } from './version-detector';

import type { ILogger } from '@exsync/logger';
import type {
  AuthNegotiator,
  CommandExecutor,
  ResponseParser,
  SoapExecutor,
} from '../interfaces/capabilities';
import type { EasResult } from '../interfaces/result';
import type { EwsGeneration } from '../interfaces/types';
import type { ConnectionContext } from './connection-context';

const SOAP_CONTENT_TYPE = 'text/xml; charset=utf-8';
const SOAP_ACTION_PREFIX = 'http://schemas.microsoft.com/exchange/services/2006/messages/';
const USER_AGENT = 'ExSync/1.0';

/** Stand-in parsed when a command succeeds with an empty body */
export const EMPTY_RESPONSE = '<Status>1</Status>';

const HTTP_PROVISION_REQUIRED = 449;

interface RawResponse {
  status: number;
  contentType: string | null;
  body: Buffer;
}

export class EasTransport implements CommandExecutor, SoapExecutor {
  private readonly logger: ILogger;

  constructor(
    private readonly context: ConnectionContext,
    private readonly negotiator: AuthNegotiator,
    logger?: ILogger
  ) {
    this.logger = logger ?? getLogger().child({ component: 'EasTransport' });
  }

  // ===========================================================================
  // ActiveSync
  // ===========================================================================

  async execute<T>(command: string, body: string, parse: ResponseParser<T>): Promise<EasResult<T>> {
    let encoded: Buffer;
    try {
      encoded = encodeWbxml(body);
    } catch (error) {
      return err(toEasError(error, `${command} request could not be encoded`));
    }

    const response = await this.send(this.context.commandUrl(command), encoded, this.easHeaders(), command);
    if (!response.ok) {
      return response;
    }

    const { status, contentType, body: raw } = response.data;
    if (status === HTTP_PROVISION_REQUIRED) {
      return fail('PROVISION_REQUIRED', `${command} rejected: device must be provisioned`, { status });
    }
    if (status < 200 || status >= 300) {
      return fail('HTTP_ERROR', `${command} failed: HTTP ${status}`, { status });
    }

    try {
      const text = isWbxml(contentType, raw) ? decodeWbxml(raw) : raw.toString('utf8');
      return ok(parse(text.trim() ? text : EMPTY_RESPONSE));
    } catch (error) {
      if (isEasError(error)) {
        return err(error);
      }
      return err(
        new EasError(`${command}: malformed response: ${getErrorMessage(error)}`, 'MALFORMED_RESPONSE', {
          cause: error,
        })
      );
    }
  }

  // ===========================================================================
  // EWS
  // ===========================================================================

  /**
   * A 500 carrying a SOAP body is a fault the caller parses, not a
   * transport failure
   */
  async executeEws(action: string, soapBody: string): Promise<EasResult<string>> {
    const envelope = buildEnvelope(soapBody, this.ewsGeneration());
    const headers = {
      'Content-Type': SOAP_CONTENT_TYPE,
      SOAPAction: `"${SOAP_ACTION_PREFIX}${action}"`,
      'User-Agent': USER_AGENT,
    };

    const response = await this.send(this.context.ewsUrl, envelope, headers, action);
    if (!response.ok) {
      return response;
    }

    const { status } = response.data;
    const body = response.data.body.toString('utf8');
    if ((status >= 200 && status < 300) || (status === 500 && /soap/i.test(body))) {
      return ok(body);
    }
    return fail('HTTP_ERROR', `EWS ${action} failed: HTTP ${status}`, { status });
  }

  ewsGeneration(): EwsGeneration {
    return majorVersionOf(this.context.protocolVersion) >= NATIVE_CAPABILITY_MAJOR ? 'modern' : 'legacy';
  }

  // ===========================================================================
  // Request Flow
  // ===========================================================================

  private easHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': WBXML_CONTENT_TYPE,
      'MS-ASProtocolVersion': this.context.protocolVersion ?? FALLBACK_VERSION,
      'User-Agent': USER_AGENT,
    };
    if (this.context.policyKey) {
      headers['X-MS-PolicyKey'] = this.context.policyKey;
    }
    return headers;
  }

  /**
   * Basic first; a 401 triggers exactly one NTLM negotiation. Once a
   * session exists every request goes through the negotiator, and a
   * rejection there is final.
   */
  private async send(
    url: string,
    body: string | Uint8Array,
    headers: Record<string, string>,
    label: string
  ): Promise<EasResult<RawResponse>> {
    if (this.context.ntlmSession) {
      return this.sendNegotiated(url, body, headers, label);
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { ...headers, Authorization: this.context.basicAuthorization() },
        body,
        signal: AbortSignal.timeout(this.context.timeoutMs),
        ...this.context.fetchOptions,
      });
    } catch (error) {
      return err(toEasError(error, `${label} request failed`));
    }

    if (response.status !== 401) {
      return this.read(response, label);
    }

    // Release the connection before the handshake reuses it
    await response.body?.cancel();
    this.logger.debug('Basic authentication refused, negotiating NTLM', { command: label });
    return this.sendNegotiated(url, body, headers, label);
  }

  private async sendNegotiated(
    url: string,
    body: string | Uint8Array,
    headers: Record<string, string>,
    label: string
  ): Promise<EasResult<RawResponse>> {
    const exchange = await this.negotiator.negotiate({
      url,
      body,
      headers,
      timeoutMs: this.context.timeoutMs,
      fetchOptions: this.context.fetchOptions,
    });

    if (!exchange) {
      this.logger.error('Authentication failed', null, { command: label });
      return fail('AUTH_FAILED', `${label} failed: server rejected the credentials`, { status: 401 });
    }

    this.context.ntlmSession = exchange.session;
    return ok({ status: exchange.status, contentType: exchange.contentType, body: exchange.body });
  }

  private async read(response: Response, label: string): Promise<EasResult<RawResponse>> {
    try {
      const body = Buffer.from(await response.arrayBuffer());
      return ok({ status: response.status, contentType: response.headers.get('content-type'), body });
    } catch (error) {
      return err(toEasError(error, `${label} response could not be read`));
    }
  }
}
