export {
	type GenerateError,
	SuggestionGenerator,
	type SuggestionGeneratorImpl,
	SuggestionGeneratorLive,
} from "./service.js";
