// packages/server/src/gateway/permissions/index.ts
export {
  PERMISSIONS,
  ALL_PERMISSIONS,
  NO_PERMISSIONS,
  hasPermission,
  parsePermissions,
  describePermissions,
  type PermissionName,
} from './flags.js';
export {
  computePermissions,
  computeBasePermissions,
  compareRoles,
  compareSnowflakes,
  type PermissionInput,
} from './resolver.js';
export { guildPermissions, channelPermissions, canViewChannel } from './lookup.js';
