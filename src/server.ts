// =============================================================================
// GATEKEEP — Main Server
// Role & permission authorization for bearer-token APIs.
// =============================================================================

import { config } from './config';
import { findUndeclaredRoles, loadRoleDeclaration } from './config/roles';
import { AuthorizationContext } from './authorization/context';
import { RoleRegistry } from './authorization/registry';
import { createAuthenticator } from './authentication/factory';
import { MemoryAuthenticator } from './authentication/memory';
import { createApp, VERSION } from './app';
import { createLogger } from './services/logger';

const logger = createLogger('Server');

const registry = RoleRegistry.fromDeclaration(loadRoleDeclaration());
const authenticator = createAuthenticator();

if (authenticator instanceof MemoryAuthenticator) {
  const undeclared = findUndeclaredRoles(registry, authenticator.referencedRoles());
  if (undeclared.length > 0) {
    logger.warn(`Token file refers to undeclared roles: ${undeclared.join(', ')}`);
  }
}

const context = new AuthorizationContext({ registry });
context.registerAuthenticator(authenticator);

const app = createApp(context);

app.listen(config.port, () => {
  logger.info(`Gatekeep ${VERSION} listening on port ${config.port}`);
  logger.info(`Env: ${config.nodeEnv}, authenticator: ${authenticator.name}`);
  logger.info(`Roles: ${registry.allRoleNames().join(', ')}`);
});
