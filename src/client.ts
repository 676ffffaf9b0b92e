import {
  DEFAULT_HTTP_TIMEOUT,
  LOOPIA_API_URL,
  STATUS_AUTH_ERROR,
  STATUS_OK,
} from './constants.js';
import { AuthenticationError, RpcError, UnknownResponseError } from './errors.js';
import { httpPost } from './http.js';
import type { HttpPostOptions } from './http.js';
import { LoopiaClientOptionsSchema, validateSchema } from './types.js';
import type { LoopiaClientOptions, ZoneRecord } from './types.js';
import {
  intMember,
  intParam,
  marshalMethodCall,
  stringMember,
  stringParam,
  structParam,
  unmarshalResponse,
} from './xmlrpc.js';
import type {
  MethodCall,
  RecordsResponse,
  ResponseShape,
  StringResponse,
  XmlRpcParam,
} from './xmlrpc.js';

export interface RpcConfig extends HttpPostOptions {
  baseUrl: string;
}

/** Loopia zone operations used for TXT record management */
export interface LoopiaClient {
  /** Add a TXT record to `subdomain` of `domain` */
  addTxtRecord(
    domain: string,
    subdomain: string,
    ttl: number,
    value: string
  ): Promise<void>;
  removeTxtRecord(
    domain: string,
    subdomain: string,
    recordId: number
  ): Promise<void>;
  /**
   * List the zone records at `subdomain`. Loopia returns records of every
   * type here, not only TXT.
   */
  getTxtRecords(domain: string, subdomain: string): Promise<ZoneRecord[]>;
  removeSubdomain(domain: string, subdomain: string): Promise<void>;
}

/**
 * Run one XML-RPC exchange: marshal, POST as `text/xml`, unmarshal, and
 * throw an `RpcError` if the response carries a non-zero fault code.
 */
export function rpcCall(
  config: RpcConfig,
  call: MethodCall,
  expected: 'string'
): Promise<StringResponse>;
export function rpcCall(
  config: RpcConfig,
  call: MethodCall,
  expected: 'records'
): Promise<RecordsResponse>;
export async function rpcCall(
  config: RpcConfig,
  call: MethodCall,
  expected: ResponseShape
): Promise<StringResponse | RecordsResponse> {
  const body = marshalMethodCall(call);
  const xml = await httpPost(config.baseUrl, 'text/xml', body, config);
  const response = await unmarshalResponse(xml, expected);

  if (response.kind === 'fault' || response.fault.code !== 0) {
    throw new RpcError(response.fault.code, response.fault.message.trim());
  }

  return response;
}

function expectOk(method: string, response: StringResponse): void {
  const status = response.value.trim();
  if (status === STATUS_OK) return;
  if (status === STATUS_AUTH_ERROR) {
    throw new AuthenticationError(method);
  }
  throw new UnknownResponseError(method, status);
}

/**
 * Create a Loopia XML-RPC client.
 *
 * Every call performs exactly one HTTP round trip and is never retried.
 * The client holds no mutable state and can be shared freely.
 */
export function createLoopiaClient(options: LoopiaClientOptions): LoopiaClient {
  const error = validateSchema(
    LoopiaClientOptionsSchema,
    options,
    'Loopia: invalid client options'
  );
  if (error) {
    throw error;
  }

  const { username, password } = options;
  const config: RpcConfig = Object.freeze({
    baseUrl: options.baseUrl ?? LOOPIA_API_URL,
    timeout: options.timeout ?? DEFAULT_HTTP_TIMEOUT,
    fetch: options.fetch,
  });

  function methodCall(methodName: string, params: XmlRpcParam[]): MethodCall {
    return {
      methodName,
      params: [stringParam(username), stringParam(password), ...params],
    };
  }

  async function statusCall(
    methodName: string,
    params: XmlRpcParam[]
  ): Promise<void> {
    const response = await rpcCall(
      config,
      methodCall(methodName, params),
      'string'
    );
    expectOk(methodName, response);
  }

  return Object.freeze({
    addTxtRecord(domain: string, subdomain: string, ttl: number, value: string) {
      return statusCall('addZoneRecord', [
        stringParam(domain),
        stringParam(subdomain),
        structParam([
          stringMember('type', 'TXT'),
          intMember('ttl', ttl),
          intMember('priority', 0),
          stringMember('rdata', value),
          intMember('record_id', 0),
        ]),
      ]);
    },

    removeTxtRecord(domain: string, subdomain: string, recordId: number) {
      return statusCall('removeZoneRecord', [
        stringParam(domain),
        stringParam(subdomain),
        intParam(recordId),
      ]);
    },

    async getTxtRecords(domain: string, subdomain: string) {
      const response = await rpcCall(
        config,
        methodCall('getZoneRecords', [
          stringParam(domain),
          stringParam(subdomain),
        ]),
        'records'
      );
      return response.records;
    },

    removeSubdomain(domain: string, subdomain: string) {
      return statusCall('removeSubdomain', [
        stringParam(domain),
        stringParam(subdomain),
      ]);
    },
  });
}
