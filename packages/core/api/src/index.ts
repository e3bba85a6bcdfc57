/**
 * @agentchat/api - HTTP surface for agents, chat threads and messages
 */

export { createServer, createServices, type ServerDeps } from './server.js';
export {
  createCredentialVerifier,
  ExternalProviderVerifier,
  LocalSecretVerifier,
  OpenTestVerifier,
  TEST_USER_ID,
  type CredentialVerifier,
  type VerifierDeps,
} from './auth/verifier.js';
export { PrivyIdentityProvider, type IdentityProvider, type ProviderUser } from './auth/identity-provider.js';
export { extractBearerToken } from './auth/bearer.js';
export { authorize, ownsAgent, ownsChat, ownsMessage } from './access-guard.js';
export { AgentService } from './agents/agent-service.js';
export { ChatManager } from './chats/chat-manager.js';
export { MessageLog, toPage, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, type PageRequest } from './chats/message-log.js';
export { DispatchCoordinator, NDJSON_CONTENT_TYPE, toNdjsonLine } from './dispatch/coordinator.js';
export { createStore, PostgresStore, SqliteStore } from './store/index.js';
export { performHealthCheck, healthStatusCode, type HealthCheckDeps } from './health.js';
