/**
 * @fileoverview Chat platform adapter.
 *
 * @module
 */

export { ChatClient, type ChatClientService } from "./client.js";
export { TelegramChatClientLive, toTransportError } from "./telegram.js";
export {
	type LoginPrompts,
	type LoginResult,
	accountName,
	isRetryableLoginError,
	signIn,
} from "./login.js";
