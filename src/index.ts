export { createLoopiaClient, rpcCall } from './client.js';
export { httpPost } from './http.js';
export {
  marshalMethodCall,
  unmarshalResponse,
  decodeValue,
  stringParam,
  intParam,
  structParam,
  stringMember,
  intMember,
} from './xmlrpc.js';
export {
  LoopiaError,
  TransportError,
  MarshalError,
  UnmarshalError,
  RpcError,
  AuthenticationError,
  UnknownResponseError,
} from './errors.js';
export { loadLoopiaConfig } from './config.js';
export {
  createChallengeSolver,
  challengeFqdn,
  dns01ChallengeValue,
  splitZoneName,
} from './challenge.js';
export {
  LOOPIA_API_URL,
  DEFAULT_HTTP_TIMEOUT,
  DEFAULT_TTL,
  MIN_TTL,
  ACME_CHALLENGE_LABEL,
} from './constants.js';
export type { LoopiaClient, RpcConfig } from './client.js';
export type { HttpPostOptions } from './http.js';
export type {
  MethodCall,
  XmlRpcParam,
  ScalarParam,
  StringParam,
  IntParam,
  StructParam,
  StructMember,
  XmlRpcResponse,
  StringResponse,
  RecordsResponse,
  FaultResponse,
  Fault,
  ResponseShape,
  XmlRpcValue,
} from './xmlrpc.js';
export type { LoopiaErrorKind } from './errors.js';
export type { LoopiaEnvConfig } from './config.js';
export type { ChallengeSolver, ChallengeSolverOptions } from './challenge.js';
export type { ZoneRecord, LoopiaClientOptions, FetchFunction } from './types.js';
