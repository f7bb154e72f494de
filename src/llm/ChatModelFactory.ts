import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { AzureChatOpenAI, ChatOpenAI, type ClientOptions } from "@langchain/openai";
import { MissingCredentialsError, UnsupportedProviderError } from "./errors";

export interface ChatModelOptions {
  temperature?: number;
}

/**
 * Splits a "provider:model" string. A bare model name means OpenAI.
 */
export function parseModelSpec(providerAndModel: string): {
  provider: string;
  model: string;
} {
  const [providerOrModel = "", ...modelNameParts] = providerAndModel.split(":");
  const modelName = modelNameParts.join(":");
  return modelName
    ? { provider: providerOrModel, model: modelName }
    : { provider: "openai", model: providerOrModel };
}

/**
 * Creates a chat model from a "provider:model" string
 * (e.g., "openai:gpt-4o-mini" or "gemini:gemini-1.5-flash").
 *
 * Environment variables required per provider:
 * - OpenAI: OPENAI_API_KEY (and optionally OPENAI_API_BASE)
 * - Google GenAI (Gemini): GOOGLE_API_KEY
 * - Microsoft: AZURE_OPENAI_API_KEY, AZURE_OPENAI_API_INSTANCE_NAME, AZURE_OPENAI_API_VERSION;
 *   the model name is the deployment name
 *
 * Provider clients never retry on their own; retries belong to the summarizer's call policy.
 * Request timeouts are set per call by ChatLanguageService.
 *
 * @throws {UnsupportedProviderError} If an unsupported provider is specified.
 * @throws {MissingCredentialsError} If the provider's credentials are not set.
 */
export function createChatModel(
  providerAndModel: string,
  options: ChatModelOptions = {},
): BaseChatModel {
  const { provider, model } = parseModelSpec(providerAndModel);
  const temperature = options.temperature ?? 0.2;

  switch (provider) {
    case "openai": {
      const apiKey = process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new MissingCredentialsError("openai", ["OPENAI_API_KEY"]);
      }
      const configuration: ClientOptions = {};
      const baseURL = process.env.OPENAI_API_BASE;
      if (baseURL) {
        configuration.baseURL = baseURL;
      }
      return new ChatOpenAI({
        model,
        apiKey,
        temperature,
        maxRetries: 0,
        configuration,
      });
    }

    case "gemini": {
      const apiKey = process.env.GOOGLE_API_KEY;
      if (!apiKey) {
        throw new MissingCredentialsError("gemini", ["GOOGLE_API_KEY"]);
      }
      return new ChatGoogleGenerativeAI({
        model,
        apiKey,
        temperature,
        maxRetries: 0,
      });
    }

    case "microsoft": {
      const missingCredentials: string[] = [];
      const apiKey = process.env.AZURE_OPENAI_API_KEY;
      const instanceName = process.env.AZURE_OPENAI_API_INSTANCE_NAME;
      const apiVersion = process.env.AZURE_OPENAI_API_VERSION;

      if (!apiKey) {
        missingCredentials.push("AZURE_OPENAI_API_KEY");
      }
      if (!instanceName) {
        missingCredentials.push("AZURE_OPENAI_API_INSTANCE_NAME");
      }
      if (!apiVersion) {
        missingCredentials.push("AZURE_OPENAI_API_VERSION");
      }
      if (missingCredentials.length > 0) {
        throw new MissingCredentialsError("microsoft", missingCredentials);
      }

      return new AzureChatOpenAI({
        azureOpenAIApiKey: apiKey,
        azureOpenAIApiInstanceName: instanceName,
        azureOpenAIApiDeploymentName: model,
        azureOpenAIApiVersion: apiVersion,
        temperature,
        maxRetries: 0,
      });
    }

    default:
      throw new UnsupportedProviderError(provider);
  }
}
