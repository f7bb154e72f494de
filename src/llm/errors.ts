/**
 * Error thrown when the credentials a chat model provider needs are not configured.
 */
export class MissingCredentialsError extends Error {
  constructor(
    public readonly provider: string,
    public readonly missing: string[],
  ) {
    super(
      `❌ Missing credentials for chat model provider '${provider}'\n` +
        `   Set the following environment variables: ${missing.join(", ")}`,
    );
    this.name = "MissingCredentialsError";
  }
}

/**
 * Error thrown when an invalid or unsupported chat model provider is specified.
 */
export class UnsupportedProviderError extends Error {
  constructor(provider: string) {
    super(
      `❌ Unsupported chat model provider: ${provider}\n` +
        "   Supported providers: openai, gemini, microsoft",
    );
    this.name = "UnsupportedProviderError";
  }
}
