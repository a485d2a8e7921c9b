import crypto from 'crypto';
import { AgentFrameworkError, FrameworkErrorCodes } from '../../utils/errorUtils';

export type ContextProperties = Record<string, unknown>;
export type ListInput = readonly (string | null | undefined)[] | null | undefined;
export type EntriesInput = Readonly<Record<string, string>> | Map<string, string> | null | undefined;

export interface AgentContextInit {
  contextId?: string;
  sessionId?: string;
  createdAt?: Date;
  lastUpdated?: Date;
  contextType: string;
  domain: string;
  properties?: ContextProperties;
}

/**
 * Base of every per-domain context. The `domain` is the routing key used by
 * the agent manager; `properties` carries free-form hints (objective,
 * required capabilities, security flags...).
 */
export abstract class AgentContext {
  readonly contextId: string;
  readonly createdAt: Date;
  readonly contextType: string;
  readonly domain: string;
  private sessionIdValue: string;
  private lastUpdatedValue: Date;
  private readonly properties: ContextProperties;

  protected constructor(init: AgentContextInit) {
    this.contextId = init.contextId ?? `context-${crypto.randomUUID()}`;
    this.sessionIdValue = init.sessionId ?? `session-${crypto.randomUUID()}`;
    this.createdAt = init.createdAt ?? new Date();
    this.lastUpdatedValue = init.lastUpdated ?? this.createdAt;
    this.contextType = init.contextType;
    this.domain = init.domain;
    this.properties = { ...init.properties };
  }

  get sessionId(): string {
    return this.sessionIdValue;
  }

  get lastUpdated(): Date {
    return this.lastUpdatedValue;
  }

  setSessionId(sessionId: string): void {
    this.sessionIdValue = sessionId;
    this.touch();
  }

  getProperties(): ContextProperties {
    return { ...this.properties };
  }

  getProperty(key: string): unknown {
    return this.properties[key];
  }

  /**
   * String view of a property; non-string values are ignored.
   */
  getStringProperty(key: string): string | undefined {
    const value = this.properties[key];
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * List view of a property: accepts string arrays or a comma separated string.
   */
  getListProperty(key: string): string[] {
    const value = this.properties[key];
    if (Array.isArray(value)) {
      return value.filter((v): v is string => typeof v === 'string' && v.trim().length > 0);
    }
    if (typeof value === 'string') {
      return value.split(',').map((v) => v.trim()).filter(Boolean);
    }
    return [];
  }

  getDescription(): string | undefined {
    return this.getStringProperty('description');
  }

  abstract isValid(): boolean;

  protected touch(): void {
    const now = new Date();
    // Keep lastUpdated monotonic even when two updates land in the same millisecond.
    this.lastUpdatedValue = now.getTime() > this.lastUpdatedValue.getTime()
      ? now
      : new Date(this.lastUpdatedValue.getTime() + 1);
  }

  /**
   * Append `value` unless already present. Returns whether the list changed.
   */
  protected addUnique(list: string[], value: string, field: string): boolean {
    if (!value || !value.trim()) {
      throw new AgentFrameworkError(FrameworkErrorCodes.INVALID_ARGUMENT, `${field} must not be empty`);
    }
    if (list.includes(value)) return false;
    list.push(value);
    this.touch();
    return true;
  }

  protected putEntry(map: Map<string, string>, key: string, value: string, field: string): void {
    if (!key || !key.trim()) {
      throw new AgentFrameworkError(FrameworkErrorCodes.INVALID_ARGUMENT, `${field} key must not be empty`);
    }
    if (map.get(key) === value) return;
    map.set(key, value);
    this.touch();
  }
}

/** Deduplicate while keeping first-seen order; drops blank entries. */
export function uniqueList(values: ListInput): string[] {
  const result: string[] = [];
  for (const value of values ?? []) {
    if (value && value.trim() && !result.includes(value)) result.push(value);
  }
  return result;
}

export function mapOf(entries: EntriesInput): Map<string, string> {
  if (!entries) return new Map();
  if (entries instanceof Map) return new Map(entries);
  return new Map(Object.entries(entries));
}

export function mapToRecord(map: Map<string, string>): Record<string, string> {
  return Object.fromEntries(map);
}

export function allMatch(values: Iterable<string>, accepted: readonly string[]): boolean {
  const list = [...values];
  if (list.length === 0) return false;
  return list.every((value) => accepted.includes(value.toUpperCase()));
}

/**
 * Fluent builder shared by every context. Setters ignore null/undefined so
 * callers can pass optional values straight through.
 */
export abstract class AgentContextBuilder<C extends AgentContext> {
  protected contextIdValue?: string;
  protected sessionIdValue?: string;
  protected createdAtValue?: Date;
  protected lastUpdatedValue?: Date;
  protected contextTypeValue: string;
  protected domainValue: string;
  protected propertiesValue: ContextProperties = {};

  protected constructor(domain: string, contextType: string) {
    this.domainValue = domain;
    this.contextTypeValue = contextType;
  }

  contextId(contextId: string | null | undefined): this {
    if (contextId) this.contextIdValue = contextId;
    return this;
  }

  sessionId(sessionId: string | null | undefined): this {
    if (sessionId) this.sessionIdValue = sessionId;
    return this;
  }

  createdAt(createdAt: Date | null | undefined): this {
    if (createdAt) this.createdAtValue = createdAt;
    return this;
  }

  lastUpdated(lastUpdated: Date | null | undefined): this {
    if (lastUpdated) this.lastUpdatedValue = lastUpdated;
    return this;
  }

  contextType(contextType: string | null | undefined): this {
    if (contextType) this.contextTypeValue = contextType;
    return this;
  }

  domain(domain: string | null | undefined): this {
    if (domain) this.domainValue = domain;
    return this;
  }

  property(key: string, value: unknown): this {
    if (value !== undefined && value !== null) this.propertiesValue[key] = value;
    return this;
  }

  properties(properties: Readonly<ContextProperties> | null | undefined): this {
    for (const [key, value] of Object.entries(properties ?? {})) {
      this.property(key, value);
    }
    return this;
  }

  description(description: string | null | undefined): this {
    return this.property('description', description);
  }

  requiresAuthentication(required: boolean): this {
    return this.property('requiresAuthentication', required);
  }

  requiresTls13(required: boolean): this {
    return this.property('requiresTLS13', required);
  }

  requiresAuditTrail(required: boolean): this {
    return this.property('requiresAuditTrail', required);
  }

  requiresAdminRole(required: boolean): this {
    return this.property('requiresAdminRole', required);
  }

  requiredPermission(permission: string | null | undefined): this {
    return this.property('requiredPermission', permission);
  }

  serviceType(serviceType: string | null | undefined): this {
    return this.property('serviceType', serviceType);
  }

  requestId(requestId: string | null | undefined): this {
    return this.property('requestId', requestId);
  }

  secretsProvider(provider: string | null | undefined): this {
    return this.property('secretsProvider', provider);
  }

  protected mergeList(current: readonly string[] | undefined, values: ListInput): string[] {
    return uniqueList([...(current ?? []), ...(values ?? [])]);
  }

  protected mergeEntries(current: Readonly<Record<string, string>> | undefined, entries: EntriesInput): Record<string, string> {
    return { ...current, ...mapToRecord(mapOf(entries)) };
  }

  protected baseInit(): AgentContextInit {
    return {
      contextId: this.contextIdValue,
      sessionId: this.sessionIdValue,
      createdAt: this.createdAtValue,
      lastUpdated: this.lastUpdatedValue,
      contextType: this.contextTypeValue,
      domain: this.domainValue,
      properties: this.propertiesValue,
    };
  }

  abstract build(): C;
}
