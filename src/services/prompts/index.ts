/**
 * @fileoverview Prompt templates for reply drafting.
 *
 * @module
 */

export { buildReplyPrompt, replyPromptVariables } from "./reply.js";
export {
	formatMessage,
	formatSpeaker,
	formatTimestamp,
	formatTranscript,
} from "./formatters.js";
export {
	type PromptFile,
	PromptFileSchema,
	PromptRoleSchema,
	type PromptSnapshot,
	PromptStore,
	PromptStoreLive,
	type PromptStoreService,
	type PromptTemplate,
	REQUIRED_PROMPTS,
	loadTemplates,
	placeholders,
	renderTemplate,
} from "./store.js";
