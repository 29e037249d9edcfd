/**
 * Azure DevOps wiki REST client
 */

export { WikiClient, toWikiError } from './WikiClient';
export { buildAuthHeaders, maskSensitiveHeaders } from './WikiAuth';
export { ok, fail, errorKindForStatus, describeWikiError } from './types';
export type {
  WikiApi,
  WikiDescriptor,
  WikiPage,
  WikiError,
  WikiErrorKind,
  RemoteResult,
  GetPageOptions
} from './types';
