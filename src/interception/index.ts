export { parseQualifiedName } from './parse.js';
export { PluginLocator, listSubdirectories } from './PluginLocator.js';
export { readIntercepts, readBindings } from './bindings.js';
export { resolvePaths } from './paths.js';
export { isServerConfigured } from './serverConfig.js';
export { InterceptResolver } from './InterceptResolver.js';
export type { InterceptResolverOptions } from './InterceptResolver.js';
export { buildSystemMessage } from './systemMessage.js';
