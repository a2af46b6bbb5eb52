export { analyzeDelegation } from './analyzer';
export type { AnalyzeOptions } from './analyzer';
export { classifyDelegation, sameNameServers } from './classifier';
export { parseDomainPair, inferParentDomain, normalizeDomain, isValidHost } from './domain';
export {
  DelegationCheckError,
  InvalidDomainError,
  InvalidParentError,
  InsufficientLabelsError,
} from './errors';
export { checkNameServerLiveness, refineVerdict } from './liveness';
export { formatReport, remediationFor, toJson, REMEDIATIONS } from './report';
export { createResolverAdapter } from './resolver';
export type { ResolverAdapter, ResolverAdapterOptions, QueryOptions } from './resolver';
export { isRoute53NameServer, normalizeNameServer } from './route53';
export * from './types';
