/**
 * Agent configuration edits.
 *
 * An agent's working configuration lives as JSON content in its agent
 * artifact (id = principal id). Subscriptions and context-section settings
 * are edits of that document, stored through the normal artifact path so
 * contract checks and disk accounting apply.
 */

import { Artifact, JsonObject, JsonValue, isJsonObject } from '../domain/artifact';
import { PermissionAction } from '../domain/contracts';
import {
  Result,
  deletedError,
  err,
  notFoundError,
  ok,
  permissionError,
  resourceError,
  validationError,
} from '../domain/errors';
import { ArtifactOperations } from './artifact-ops';
import { KernelContext } from './context';

export const CONFIG_SUBSCRIBED_ARTIFACTS = 'subscribed_artifacts';
export const CONFIG_CONTEXT_SECTIONS = 'context_sections';
export const CONFIG_SECTION_PRIORITIES = 'context_section_priorities';

/** Prompt sections an agent may switch on or off. */
export const CONTEXT_SECTIONS: readonly string[] = [
  'working_memory',
  'rag_memories',
  'action_history',
  'failure_history',
  'recent_events',
  'resource_metrics',
  'mint_submissions',
  'quota_info',
  'metacognitive',
  'subscribed_artifacts',
];

export interface SubscriptionChange {
  subscriptions: string[];
  changed: boolean;
}

function stringList(value: JsonValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export class AgentConfigurator {
  constructor(
    private ctx: KernelContext,
    private ops: ArtifactOperations,
  ) {}

  async subscribe(principalId: string, artifactId: string): Promise<Result<SubscriptionChange>> {
    const target = await this.ctx.store.artifacts.get(artifactId);
    if (!target) return err(notFoundError('Artifact', artifactId));
    if (target.deleted) return err(deletedError(artifactId));
    const permission = await this.ctx.permissions.check(principalId, PermissionAction.Read, target);
    if (!permission.allowed) {
      return err(permissionError(permission.reason, 'not_authorized', { artifactId, action: PermissionAction.Read }));
    }

    const loaded = await this.load(principalId);
    if (!loaded.ok) return loaded;
    const { agent, config } = loaded.value;
    const subscriptions = stringList(config[CONFIG_SUBSCRIBED_ARTIFACTS]);
    if (subscriptions.includes(artifactId)) return ok({ subscriptions, changed: false });
    if (subscriptions.length >= this.ctx.config.maxSubscriptions) {
      return err(
        resourceError('limit_reached', `Subscription limit ${this.ctx.config.maxSubscriptions} reached`, {
          limit: this.ctx.config.maxSubscriptions,
        }),
      );
    }

    subscriptions.push(artifactId);
    const saved = await this.save(principalId, agent, { ...config, [CONFIG_SUBSCRIBED_ARTIFACTS]: subscriptions });
    return saved.ok ? ok({ subscriptions, changed: true }) : saved;
  }

  async unsubscribe(principalId: string, artifactId: string): Promise<Result<SubscriptionChange>> {
    const loaded = await this.load(principalId);
    if (!loaded.ok) return loaded;
    const { agent, config } = loaded.value;
    const current = stringList(config[CONFIG_SUBSCRIBED_ARTIFACTS]);
    if (!current.includes(artifactId)) {
      return err(validationError('not_present', `Not subscribed to ${artifactId}`, { artifactId }));
    }
    const subscriptions = current.filter((id) => id !== artifactId);
    const saved = await this.save(principalId, agent, { ...config, [CONFIG_SUBSCRIBED_ARTIFACTS]: subscriptions });
    return saved.ok ? ok({ subscriptions, changed: true }) : saved;
  }

  /** Merge section switches and priorities into the agent's config. Unknown sections are rejected. */
  async configureContext(
    principalId: string,
    sections: Record<string, boolean>,
    priorities: Record<string, number> = {},
  ): Promise<Result<JsonObject>> {
    const unknown = [...Object.keys(sections), ...Object.keys(priorities)].filter(
      (name) => !CONTEXT_SECTIONS.includes(name),
    );
    if (unknown.length > 0) {
      return err(
        validationError('invalid_argument', `Unknown context sections: ${unknown.join(', ')}`, {
          unknown,
          validSections: [...CONTEXT_SECTIONS],
        }),
      );
    }
    if (Object.keys(sections).length === 0 && Object.keys(priorities).length === 0) {
      return err(validationError('missing_argument', 'configure_context requires sections or priorities'));
    }

    const loaded = await this.load(principalId);
    if (!loaded.ok) return loaded;
    const { agent, config } = loaded.value;
    const currentSections = config[CONFIG_CONTEXT_SECTIONS];
    const currentPriorities = config[CONFIG_SECTION_PRIORITIES];
    const next: JsonObject = {
      ...config,
      [CONFIG_CONTEXT_SECTIONS]: { ...(isJsonObject(currentSections) ? currentSections : {}), ...sections },
      [CONFIG_SECTION_PRIORITIES]: { ...(isJsonObject(currentPriorities) ? currentPriorities : {}), ...priorities },
    };
    const saved = await this.save(principalId, agent, next);
    return saved.ok ? ok(next) : saved;
  }

  private async load(principalId: string): Promise<Result<{ agent: Artifact; config: JsonObject }>> {
    const agent = await this.ctx.store.artifacts.get(principalId);
    if (!agent) return err(notFoundError('Agent artifact', principalId));
    if (agent.deleted) return err(deletedError(principalId));
    if (agent.content.trim() === '') return ok({ agent, config: {} });
    let parsed: unknown;
    try {
      parsed = JSON.parse(agent.content);
    } catch {
      parsed = undefined;
    }
    if (!isJsonObject(parsed)) {
      return err(validationError('invalid_type', `Agent artifact ${principalId} does not hold a JSON object`));
    }
    return ok({ agent, config: parsed });
  }

  private async save(principalId: string, agent: Artifact, config: JsonObject): Promise<Result<void>> {
    const permission = await this.ctx.permissions.check(principalId, PermissionAction.Write, agent);
    if (!permission.allowed) {
      return err(permissionError(permission.reason, 'not_authorized', { artifactId: agent.id }));
    }
    const written = await this.ops.replaceContent(principalId, agent, JSON.stringify(config, null, 2));
    return written.ok ? ok(undefined) : written;
  }
}
