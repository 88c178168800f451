/**
 * API handler exports.
 */

export { createTagHandlers, type TagHandlers } from './TagHandlers.js';
export { createQueryHandlers, type QueryHandlers } from './QueryHandlers.js';
export { createCommentHandlers, type CommentHandlers } from './CommentHandlers.js';
export { createRelationHandlers, type RelationHandlers } from './RelationHandlers.js';
export { createFileHandlers, type FileHandlers } from './FileHandlers.js';
