/**
 * knowledge-base module: the Documentation Synthesizer.
 */

export type { DocRef, DocumentationSynthesizer } from './documentation-synthesizer.js'
export { FileKnowledgeBase, createFileKnowledgeBase, renderEntry } from './file-knowledge-base.js'
export type { FileKnowledgeBaseOptions } from './file-knowledge-base.js'
