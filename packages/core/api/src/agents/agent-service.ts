import { createInternalError, type Agent, type AgentCreateRequest, type AgentStore } from '@agentchat/types';
import { newId, systemClock, type Clock, type IdGenerator } from '@agentchat/utils';
import { authorize, ownsAgent } from '../access-guard.js';

export interface AgentServiceOptions {
  idGenerator?: IdGenerator;
  clock?: Clock;
}

export class AgentService {
  private readonly idGenerator: IdGenerator;
  private readonly clock: Clock;

  constructor(
    private readonly store: AgentStore,
    options: AgentServiceOptions = {}
  ) {
    this.idGenerator = options.idGenerator ?? newId;
    this.clock = options.clock ?? systemClock;
  }

  async create(owner: string, request: AgentCreateRequest): Promise<Agent> {
    const now = this.clock().toISOString();
    const id = this.idGenerator();
    await this.store.createAgent({
      id,
      owner,
      name: request.name,
      description: request.description ?? null,
      model: request.model ?? null,
      prompt: request.prompt ?? null,
      temperature: request.temperature ?? null,
      created_at: now,
      updated_at: now,
    });

    const created = await this.store.getAgent(id);
    if (!created) {
      throw createInternalError(`Agent ${id} was not persisted`, { component: 'agents' });
    }
    return created;
  }

  /** The agent when `identity` owns it; not found otherwise */
  get(agentId: string, identity: string): Promise<Agent> {
    return authorize(() => this.store.getAgent(agentId), ownsAgent(identity), `Agent ${agentId} not found`);
  }
}
