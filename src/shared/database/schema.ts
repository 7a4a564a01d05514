export { subscriptionTierEnum, tenants } from '../../modules/tenant/tenant.schema.js';
export { userRoleEnum, users } from '../../modules/identity/identity.schema.js';
