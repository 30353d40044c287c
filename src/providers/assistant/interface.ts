/**
 * Function the assistant may call during a run
 */
export interface AssistantTool {
  name: string;
  description: string;
  /** JSON schema of the arguments object */
  parameters: Record<string, unknown>;
  execute(args: Record<string, unknown>): unknown;
}

/**
 * Conversational assistant provider interface
 */
export interface AssistantProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: string;

  /**
   * Ask the assistant a single question in a fresh conversation.
   * Resolves to the reply text, or null when the assistant produced none.
   * Throws on provider failure.
   */
  respond(query: string): Promise<string | null>;

  /**
   * Check if the provider is properly configured and available
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Assistants API configuration
 */
export interface AssistantConfig {
  apiUrl: string;
  apiKey?: string;
  /** Reuse this assistant; one is created per call when unset */
  assistantId?: string;
  model: string;
  pollIntervalMs: number;
  maxPollIntervalMs: number;
  runTimeoutMs: number;
}
