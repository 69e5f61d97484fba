export {
  buildIndex,
  buildRemoteObjects,
  INDEX_FILENAME,
  INDEX_CONTENT_TYPE,
} from './builder.js';
export { renderRootIndex, renderPackageIndex, escapeHtml } from './html.js';

export type {
  PackageIndexPage,
  RootIndexPage,
  SimpleIndex,
  RemoteObject,
  RemoteObjectKind,
  RemoteObjectSource,
} from './types.js';
