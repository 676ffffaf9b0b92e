import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { MarshalError, UnmarshalError } from './errors.js';
import { formatIssues } from './types.js';
import type { ZoneRecord } from './types.js';

// ─── Method calls ────────────────────────────────────────────────────────

export interface StringParam {
  kind: 'string';
  value: string;
}

export interface IntParam {
  kind: 'int';
  value: number;
}

export type ScalarParam = StringParam | IntParam;

export type StructMember = { name: string } & ScalarParam;

export interface StructParam {
  kind: 'struct';
  members: readonly StructMember[];
}

export type XmlRpcParam = ScalarParam | StructParam;

export interface MethodCall {
  methodName: string;
  params: readonly XmlRpcParam[];
}

export function stringParam(value: string): StringParam {
  return { kind: 'string', value };
}

export function intParam(value: number): IntParam {
  return { kind: 'int', value };
}

export function structParam(members: readonly StructMember[]): StructParam {
  return { kind: 'struct', members };
}

export function stringMember(name: string, value: string): StructMember {
  return { name, kind: 'string', value };
}

export function intMember(name: string, value: number): StructMember {
  return { name, kind: 'int', value };
}

// ─── Responses ───────────────────────────────────────────────────────────

/** Fault info common to every response; `code === 0` means no fault */
export interface Fault {
  code: number;
  message: string;
}

export interface StringResponse {
  kind: 'string';
  value: string;
  fault: Fault;
}

export interface RecordsResponse {
  kind: 'records';
  records: ZoneRecord[];
  fault: Fault;
}

export interface FaultResponse {
  kind: 'fault';
  fault: Fault;
}

export type XmlRpcResponse = StringResponse | RecordsResponse | FaultResponse;

/** Payload shape expected by the operation that issued the call */
export type ResponseShape = 'string' | 'records';

/** A decoded `<value>` of any XML-RPC type */
export type XmlRpcValue =
  | string
  | number
  | boolean
  | XmlRpcValue[]
  | { [member: string]: XmlRpcValue };

const NO_FAULT: Fault = { code: 0, message: '' };

// ─── Marshal ─────────────────────────────────────────────────────────────

const XML_DECLARATION = '<?xml version="1.0"?>';
const INDENT = '  ';

// Anything outside the XML 1.0 Char production, lone surrogates included
const INVALID_XML_CHAR =
  /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;

function escapeXml(s: string): string {
  const invalid = INVALID_XML_CHAR.exec(s);
  if (invalid) {
    const code = invalid[0].codePointAt(0) ?? 0;
    throw new MarshalError(
      `character U+${code.toString(16).toUpperCase().padStart(4, '0')} is not allowed in XML`
    );
  }
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function line(depth: number, content: string): string {
  return `${INDENT.repeat(depth)}${content}`;
}

function wrap(tag: string, depth: number, inner: string[]): string[] {
  return [line(depth, `<${tag}>`), ...inner, line(depth, `</${tag}>`)];
}

function renderInt(value: number): string {
  if (!Number.isSafeInteger(value)) {
    throw new MarshalError(`int value ${value} is not a safe integer`);
  }
  return String(value);
}

function renderMember(member: StructMember, depth: number): string[] {
  if (!member.name) {
    throw new MarshalError('struct member name must not be empty');
  }
  return wrap('member', depth, [
    line(depth + 1, `<name>${escapeXml(member.name)}</name>`),
    ...renderValue(member, depth + 1),
  ]);
}

function renderValue(param: XmlRpcParam, depth: number): string[] {
  switch (param.kind) {
    case 'string':
      return wrap('value', depth, [
        line(depth + 1, `<string>${escapeXml(param.value)}</string>`),
      ]);
    case 'int':
      return wrap('value', depth, [
        line(depth + 1, `<int>${renderInt(param.value)}</int>`),
      ]);
    case 'struct':
      return wrap(
        'value',
        depth,
        wrap(
          'struct',
          depth + 1,
          param.members.flatMap((m) => renderMember(m, depth + 2))
        )
      );
  }
}

/**
 * Serialize a method call into an XML-RPC request document.
 *
 * The document starts with a bare `<?xml version="1.0"?>` declaration and is
 * indented with two spaces.
 */
export function marshalMethodCall(call: MethodCall): string {
  if (!call.methodName) {
    throw new MarshalError('method name must not be empty');
  }

  const body = wrap('methodCall', 0, [
    line(1, `<methodName>${escapeXml(call.methodName)}</methodName>`),
    ...wrap(
      'params',
      1,
      call.params.flatMap((p) => wrap('param', 2, renderValue(p, 3)))
    ),
  ]);

  return [XML_DECLARATION, ...body].join('\n');
}

// ─── Unmarshal ───────────────────────────────────────────────────────────

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: unknown, tag: string): unknown[] {
  if (!isNode(node)) return [];
  const list = node[tag];
  return Array.isArray(list) ? list : [];
}

function child(node: unknown, tag: string): unknown {
  return children(node, tag)[0];
}

/** Text content of an element, or undefined if it has child elements */
function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (isNode(node) && Object.keys(node).every((k) => k === '_' || k === '$')) {
    return typeof node._ === 'string' ? node._ : '';
  }
  return undefined;
}

function typeName(value: XmlRpcValue): string {
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'struct';
  return typeof value;
}

function scalarText(node: XmlNode, tag: string): string {
  const text = textOf(child(node, tag));
  if (text === undefined) {
    throw new UnmarshalError(`<${tag}> must contain text`);
  }
  return text.trim();
}

const INT_PATTERN = /^[+-]?\d+$/;

function decodeInt(text: string): number {
  const value = Number(text);
  if (!INT_PATTERN.test(text) || !Number.isSafeInteger(value)) {
    throw new UnmarshalError(`invalid int "${text}"`);
  }
  return value;
}

function decodeStruct(struct: unknown): { [member: string]: XmlRpcValue } {
  const entries = children(struct, 'member').map(
    (member): [string, XmlRpcValue] => {
      const name = textOf(child(member, 'name'));
      if (name === undefined) {
        throw new UnmarshalError('struct member without a name');
      }
      return [name.trim(), decodeValue(child(member, 'value'))];
    }
  );
  return Object.fromEntries(entries);
}

/**
 * Decode an xml2js `<value>` node. A value without a type element is a
 * string, as XML-RPC prescribes.
 */
export function decodeValue(node: unknown): XmlRpcValue {
  const text = textOf(node);
  if (text !== undefined) return text;
  if (!isNode(node)) {
    throw new UnmarshalError('missing <value> element');
  }

  if ('string' in node) {
    const value = textOf(child(node, 'string'));
    if (value === undefined) {
      throw new UnmarshalError('<string> must contain text');
    }
    return value;
  }
  if ('int' in node) return decodeInt(scalarText(node, 'int'));
  if ('i4' in node) return decodeInt(scalarText(node, 'i4'));
  if ('boolean' in node) {
    const value = scalarText(node, 'boolean');
    if (value !== '0' && value !== '1') {
      throw new UnmarshalError(`invalid boolean "${value}"`);
    }
    return value === '1';
  }
  if ('double' in node) {
    const value = Number(scalarText(node, 'double'));
    if (Number.isNaN(value)) {
      throw new UnmarshalError('invalid double');
    }
    return value;
  }
  if ('struct' in node) return decodeStruct(child(node, 'struct'));
  if ('array' in node) {
    const data = child(child(node, 'array'), 'data');
    return children(data, 'value').map((v) => decodeValue(v));
  }

  throw new UnmarshalError(
    `unsupported value type <${Object.keys(node).join(', ')}>`
  );
}

const FaultSchema = z.object({
  faultCode: z.number().int(),
  faultString: z.string().default(''),
});

const ZoneRecordSchema = z
  .object({
    type: z.string(),
    ttl: z.number().int().default(0),
    priority: z.number().int().default(0),
    rdata: z.string(),
    record_id: z.number().int(),
  })
  .transform(
    (r): ZoneRecord => ({
      type: r.type,
      ttl: r.ttl,
      priority: r.priority,
      rdata: r.rdata,
      recordId: r.record_id,
    })
  );

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UnmarshalError(`invalid ${what}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function decodeFault(fault: unknown): Fault {
  const parsed = parseWith(FaultSchema, decodeValue(child(fault, 'value')), 'fault');
  return { code: parsed.faultCode, message: parsed.faultString };
}

function decodePayload(
  value: XmlRpcValue,
  expected: ResponseShape
): StringResponse | RecordsResponse {
  if (expected === 'string') {
    if (typeof value !== 'string') {
      throw new UnmarshalError(`expected a string result, got ${typeName(value)}`);
    }
    return { kind: 'string', value, fault: NO_FAULT };
  }

  if (!Array.isArray(value)) {
    const got = typeof value === 'string' ? `string "${value.trim()}"` : typeName(value);
    throw new UnmarshalError(`expected a record list, got ${got}`);
  }
  const records = value.map((item, i) =>
    parseWith(ZoneRecordSchema, item, `record ${i}`)
  );
  return { kind: 'records', records, fault: NO_FAULT };
}

/**
 * Decode an XML-RPC `methodResponse` document.
 *
 * A non-zero fault yields a `fault` response whatever else the document
 * carries. Text values are returned as sent; callers trim before comparing.
 */
export function unmarshalResponse(
  xml: string,
  expected: 'string'
): Promise<StringResponse | FaultResponse>;
export function unmarshalResponse(
  xml: string,
  expected: 'records'
): Promise<RecordsResponse | FaultResponse>;
export function unmarshalResponse(
  xml: string,
  expected: ResponseShape
): Promise<XmlRpcResponse>;
export async function unmarshalResponse(
  xml: string,
  expected: ResponseShape
): Promise<XmlRpcResponse> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml, {
      explicitArray: true,
      trim: false,
      normalize: false,
    });
  } catch (error) {
    throw new UnmarshalError('response is not well-formed XML', {
      cause: error,
    });
  }

  const root = isNode(parsed) ? parsed.methodResponse : undefined;
  if (!isNode(root)) {
    throw new UnmarshalError('missing <methodResponse> element');
  }

  const faultNode = child(root, 'fault');
  if (faultNode !== undefined) {
    const fault = decodeFault(faultNode);
    if (fault.code !== 0) {
      return { kind: 'fault', fault };
    }
  }

  const param = child(child(root, 'params'), 'param');
  if (param === undefined) {
    throw new UnmarshalError('missing <params><param> element');
  }

  return decodePayload(decodeValue(child(param, 'value')), expected);
}
