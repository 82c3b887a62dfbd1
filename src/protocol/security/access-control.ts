import { StakingError } from '../errors.js';

/** Every privileged ledger action the authorizer is asked about. */
export type StakingAction =
    | 'pool:add'
    | 'pool:update'
    | 'pool:weight'
    | 'emission:update'
    | 'pause:toggle';

export const STAKING_ACTIONS: readonly StakingAction[] = [
    'pool:add',
    'pool:update',
    'pool:weight',
    'emission:update',
    'pause:toggle',
];

export interface Authorizer {
    isAuthorized(principal: string, action: StakingAction): boolean;
}

export enum Role { ADMIN = 'admin', GUARDIAN = 'guardian' }

const rolePermissions: Record<Role, readonly StakingAction[]> = {
    [Role.ADMIN]: STAKING_ACTIONS,
    [Role.GUARDIAN]: ['pause:toggle'],
};

/**
 * Role registry behind the Authorizer interface.
 * Admins hold every action; guardians may only flip pause flags.
 */
export class RoleAuthorizer implements Authorizer {
    private roles = new Map<string, Set<Role>>();

    grantRole(principal: string, role: Role): void {
        const roles = this.roles.get(principal) || new Set<Role>();
        roles.add(role);
        this.roles.set(principal, roles);
    }

    revokeRole(principal: string, role: Role): void {
        this.roles.get(principal)?.delete(role);
    }

    hasRole(principal: string, role: Role): boolean {
        return this.roles.get(principal)?.has(role) ?? false;
    }

    isAuthorized(principal: string, action: StakingAction): boolean {
        const roles = this.roles.get(principal);
        if (!roles) return false;
        for (const role of roles) {
            if (rolePermissions[role].includes(action)) return true;
        }
        return false;
    }
}

export function requireAuthorized(authorizer: Authorizer, principal: string, action: StakingAction): void {
    if (!authorizer.isAuthorized(principal, action)) {
        throw new StakingError('Unauthorized', `${principal} is not allowed to ${action}`);
    }
}
