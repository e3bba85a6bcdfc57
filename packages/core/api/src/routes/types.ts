import type { AgentService } from '../agents/agent-service.js';
import type { ChatManager } from '../chats/chat-manager.js';
import type { MessageLog } from '../chats/message-log.js';
import type { DispatchCoordinator } from '../dispatch/coordinator.js';

export interface ApiServices {
  agents: AgentService;
  chats: ChatManager;
  messages: MessageLog;
  dispatch: DispatchCoordinator;
}

export interface AgentParams {
  aid: string;
}

export interface ChatParams extends AgentParams {
  cid: string;
}

export interface MessageParams {
  mid: string;
}
