import { AgentStatus } from './AgentStatus';
import { AgentType } from './AgentType';

export type ResponseMetadata = Readonly<Record<string, unknown>>;

/**
 * Plain JSON shape of a response, as sent over HTTP.
 */
export interface AgentResponseJson {
  requestId?: string;
  agentType?: AgentType;
  status: AgentStatus;
  success: boolean;
  output: string;
  confidence: number;
  recommendations: string[];
  metadata: Record<string, unknown>;
  processingTimeMs: number;
  errorMessage?: string;
  timestamp: string;
}

function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Immutable result of an agent consultation. Instances are frozen; use
 * {@link AgentResponse.builder} or the static factories to create them.
 */
export class AgentResponse {
  readonly requestId?: string;
  readonly agentType?: AgentType;
  readonly status: AgentStatus;
  readonly output: string;
  readonly confidence: number;
  readonly recommendations: readonly string[];
  readonly metadata: ResponseMetadata;
  readonly processingTimeMs: number;
  readonly errorMessage?: string;
  readonly timestamp: Date;

  private constructor(builder: AgentResponseBuilder) {
    this.requestId = builder.requestIdValue;
    this.agentType = builder.agentTypeValue;
    this.status = builder.statusValue;
    this.output = builder.outputValue ?? builder.errorMessageValue ?? '';
    this.confidence = clampConfidence(builder.confidenceValue);
    this.recommendations = Object.freeze([...builder.recommendationsValue]);
    this.metadata = Object.freeze({ ...builder.metadataValue });
    this.processingTimeMs = Math.max(0, builder.processingTimeMsValue);
    this.errorMessage = builder.errorMessageValue;
    this.timestamp = builder.timestampValue ?? new Date();
    Object.freeze(this);
  }

  static builder(): AgentResponseBuilder {
    return new AgentResponseBuilder();
  }

  static success(output: string, confidence: number, recommendations: readonly string[] = []): AgentResponse {
    return AgentResponse.builder()
      .status(AgentStatus.SUCCESS)
      .output(output)
      .confidence(confidence)
      .recommendations(recommendations)
      .build();
  }

  static failure(message: string): AgentResponse {
    return AgentResponse.builder().errorMessage(message).output(message).confidence(0).build();
  }

  /**
   * Deliberate stop (loop breaker, scope limits). Not an error.
   */
  static stopped(reason: string, recommendations: readonly string[] = []): AgentResponse {
    return AgentResponse.builder()
      .status(AgentStatus.STOPPED)
      .output(reason)
      .confidence(0)
      .recommendations(recommendations)
      .metadata({ stopReason: reason })
      .build();
  }

  /** @internal used by the builder */
  static fromBuilder(builder: AgentResponseBuilder): AgentResponse {
    return new AgentResponse(builder);
  }

  isSuccess(): boolean {
    return this.status === AgentStatus.SUCCESS;
  }

  /**
   * Copy of this response with a different builder applied on top.
   */
  toBuilder(): AgentResponseBuilder {
    const builder = AgentResponse.builder()
      .status(this.status)
      .output(this.output)
      .confidence(this.confidence)
      .recommendations(this.recommendations)
      .metadata(this.metadata)
      .processingTimeMs(this.processingTimeMs)
      .timestamp(this.timestamp);
    if (this.requestId) builder.requestId(this.requestId);
    if (this.agentType) builder.agentType(this.agentType);
    if (this.errorMessage !== undefined) builder.errorMessage(this.errorMessage);
    return builder;
  }

  withProcessingTime(processingTimeMs: number): AgentResponse {
    return this.toBuilder().processingTimeMs(processingTimeMs).build();
  }

  withMetadata(metadata: Record<string, unknown>): AgentResponse {
    return this.toBuilder().metadata({ ...this.metadata, ...metadata }).build();
  }

  toJSON(): AgentResponseJson {
    return {
      requestId: this.requestId,
      agentType: this.agentType,
      status: this.status,
      success: this.isSuccess(),
      output: this.output,
      confidence: this.confidence,
      recommendations: [...this.recommendations],
      metadata: { ...this.metadata },
      processingTimeMs: this.processingTimeMs,
      errorMessage: this.errorMessage,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class AgentResponseBuilder {
  requestIdValue?: string;
  agentTypeValue?: AgentType;
  statusValue: AgentStatus = AgentStatus.SUCCESS;
  outputValue?: string;
  confidenceValue = 0;
  recommendationsValue: string[] = [];
  metadataValue: Record<string, unknown> = {};
  processingTimeMsValue = 0;
  errorMessageValue?: string;
  timestampValue?: Date;

  requestId(requestId: string): this {
    this.requestIdValue = requestId;
    return this;
  }

  agentType(agentType: AgentType): this {
    this.agentTypeValue = agentType;
    return this;
  }

  status(status: AgentStatus): this {
    this.statusValue = status;
    return this;
  }

  /**
   * Boolean shortcut: true → SUCCESS, false → FAILURE.
   */
  success(success: boolean): this {
    this.statusValue = success ? AgentStatus.SUCCESS : AgentStatus.FAILURE;
    return this;
  }

  output(output: string): this {
    this.outputValue = output;
    return this;
  }

  confidence(confidence: number): this {
    this.confidenceValue = confidence;
    return this;
  }

  recommendations(recommendations: readonly string[]): this {
    this.recommendationsValue = recommendations.filter((r) => r.trim().length > 0);
    return this;
  }

  metadata(metadata: Readonly<Record<string, unknown>>): this {
    this.metadataValue = { ...metadata };
    return this;
  }

  processingTimeMs(processingTimeMs: number): this {
    this.processingTimeMsValue = processingTimeMs;
    return this;
  }

  /**
   * Setting an error message always marks the response as FAILURE.
   */
  errorMessage(errorMessage: string): this {
    this.errorMessageValue = errorMessage;
    this.statusValue = AgentStatus.FAILURE;
    return this;
  }

  timestamp(timestamp: Date): this {
    this.timestampValue = timestamp;
    return this;
  }

  build(): AgentResponse {
    return AgentResponse.fromBuilder(this);
  }
}
