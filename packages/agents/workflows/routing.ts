// Routing workflow — picks one specialist for a query; never dispatches to it

import type { RoutingDecision } from '../types/research.js';
import type { StructuredModelCaller } from '../llm/structured-caller.js';
import { decode, RoutingSchema } from '../llm/schemas.js';
import { CALL_SETTINGS, SYSTEM_PROMPTS, routingPrompt } from '../config/prompts.js';
import { describeAgent } from '../config/agent-catalog.js';
import { createLogger } from '../utils/logger.js';
import { ValidationError, errorMessage } from '../utils/errors.js';

const log = createLogger('Router');

export const ROUTING_NAME = 'Routing Workflow';

export class RoutingWorkflow {
  readonly name = ROUTING_NAME;

  constructor(private readonly caller: StructuredModelCaller) {}

  async route(query: string, candidates: readonly string[]): Promise<RoutingDecision> {
    const [first] = candidates;
    if (first === undefined) {
      throw new ValidationError('Routing requires at least one candidate agent');
    }
    const available = [...candidates];
    const agentsInfo = available.map(name => `- ${name}: ${describeAgent(name)}`).join('\n');

    let fallbackReason = 'Fallback routing';
    try {
      const response = await this.caller.call(
        {
          system: SYSTEM_PROMPTS.routing,
          prompt: routingPrompt(query, agentsInfo),
          ...CALL_SETTINGS.routing,
        },
        { onParseError: 'throw' },
      );
      const decoded = decode(RoutingSchema, response.json);
      if (decoded.kind === 'typed' && available.includes(decoded.value.selected_agent)) {
        return {
          query,
          selected_agent: decoded.value.selected_agent,
          reasoning: decoded.value.reasoning,
          available_agents: available,
          routing_method: 'LLM-powered',
          timestamp: new Date().toISOString(),
        };
      }
      fallbackReason = decoded.kind === 'typed'
        ? `Fallback routing: model chose unknown agent "${decoded.value.selected_agent}"`
        : 'Fallback routing: model reply named no agent';
      log.warn(fallbackReason, { query });
    } catch (err) {
      log.warn('Routing call failed; selecting first candidate', { query, error: errorMessage(err) });
    }

    return {
      query,
      selected_agent: first,
      reasoning: fallbackReason,
      available_agents: available,
      routing_method: 'fallback',
      timestamp: new Date().toISOString(),
    };
  }
}
