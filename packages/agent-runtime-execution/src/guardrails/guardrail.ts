/**
 * Guardrails
 *
 * Pass/fail validators run against an agent's input or output text.
 * Agents reference guardrails either directly or by id through a
 * GuardrailRegistry, so an agent rebuilt in another process (for example to
 * resume a paused run) gets the same checks by naming the same ids.
 */

import { AgentConfigurationError, type ConversationContext } from "@agentloom/agent-runtime-core";

// ============================================================================
// Types
// ============================================================================

export type GuardrailResult = { readonly passed: true } | { readonly passed: false; readonly reason: string };

export type GuardrailStage = "input" | "output";

export interface Guardrail {
  readonly id: string;
  validate(text: string, context: ConversationContext): GuardrailResult | Promise<GuardrailResult>;
}

/** A guardrail or the id of one registered in a GuardrailRegistry */
export type GuardrailRef = Guardrail | string;

export const GUARDRAIL_PASSED: GuardrailResult = { passed: true };

export function guardrailFailed(reason: string): GuardrailResult {
  return { passed: false, reason };
}

/**
 * Build a guardrail from a predicate; `reason` is reported when it returns false.
 */
export function createGuardrail(
  id: string,
  predicate: (text: string, context: ConversationContext) => boolean | Promise<boolean>,
  reason: string
): Guardrail {
  return {
    id,
    async validate(text, context) {
      return (await predicate(text, context)) ? GUARDRAIL_PASSED : guardrailFailed(reason);
    },
  };
}

// ============================================================================
// Registry
// ============================================================================

export class GuardrailRegistry {
  private readonly guardrails = new Map<string, Guardrail>();

  constructor(guardrails: readonly Guardrail[] = []) {
    for (const guardrail of guardrails) {
      this.register(guardrail);
    }
  }

  register(guardrail: Guardrail): this {
    if (this.guardrails.has(guardrail.id)) {
      throw new AgentConfigurationError(`Guardrail "${guardrail.id}" is already registered`);
    }
    this.guardrails.set(guardrail.id, guardrail);
    return this;
  }

  get(id: string): Guardrail | undefined {
    return this.guardrails.get(id);
  }

  has(id: string): boolean {
    return this.guardrails.has(id);
  }

  ids(): string[] {
    return [...this.guardrails.keys()];
  }
}

/**
 * Resolve guardrail references; ids must be present in the registry.
 */
export function resolveGuardrails(
  refs: readonly GuardrailRef[],
  registry?: GuardrailRegistry
): Guardrail[] {
  return refs.map((ref) => {
    if (typeof ref !== "string") {
      return ref;
    }
    const guardrail = registry?.get(ref);
    if (!guardrail) {
      throw new AgentConfigurationError(`Unknown guardrail "${ref}"`);
    }
    return guardrail;
  });
}

/**
 * Run guardrails in order; the first failure wins.
 */
export async function runGuardrails(
  guardrails: readonly Guardrail[],
  text: string,
  context: ConversationContext
): Promise<GuardrailResult> {
  for (const guardrail of guardrails) {
    const result = await guardrail.validate(text, context);
    if (!result.passed) {
      return result;
    }
  }
  return GUARDRAIL_PASSED;
}
