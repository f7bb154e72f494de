export { ChatLanguageService } from "./ChatLanguageService";
export type { ChatLanguageServiceOptions } from "./ChatLanguageService";
export { createChatModel, parseModelSpec } from "./ChatModelFactory";
export type { ChatModelOptions } from "./ChatModelFactory";
export { MissingCredentialsError, UnsupportedProviderError } from "./errors";
