import { UserRole } from '../types';

export type PolicyAction = 'create' | 'read' | 'list' | 'update' | 'delete';

export type PolicyResource =
  | 'notice'
  | 'student'
  | 'staff'
  | 'hod'
  | 'departmentHod'
  | 'subject'
  | 'syllabus'
  | 'profile';

export interface PolicyActor {
  role: UserRole;
  isStaff: boolean;
}

type Rule = (actor: PolicyActor) => boolean;

const anyone: Rule = () => true;
const adminOnly: Rule = (actor) => actor.role === 'admin';
const adminOrStaff: Rule = (actor) => actor.role === 'admin' || actor.role === 'staff';
// Catalog writes go by the staff flag, not the role tag.
const staffPrivileged: Rule = (actor) => actor.role === 'admin' || actor.isStaff;

const RULES: Record<PolicyResource, Partial<Record<PolicyAction, Rule>>> = {
  notice: { create: adminOrStaff, read: anyone, list: anyone, update: adminOnly, delete: adminOnly },
  student: { create: adminOrStaff, read: adminOnly, list: adminOnly, update: adminOnly, delete: adminOnly },
  staff: { create: adminOnly, read: adminOnly, list: adminOnly, update: adminOnly, delete: adminOnly },
  hod: { create: adminOnly, read: adminOnly, list: adminOnly, update: adminOnly, delete: adminOnly },
  departmentHod: { read: anyone },
  subject: {
    create: staffPrivileged,
    read: anyone,
    list: anyone,
    update: staffPrivileged,
    delete: staffPrivileged,
  },
  syllabus: {
    create: staffPrivileged,
    read: anyone,
    list: anyone,
    update: staffPrivileged,
    delete: staffPrivileged,
  },
  profile: { read: anyone },
};

/**
 * Whether `actor` may perform `action` on `resource`. Anything not listed is denied.
 * Audience filtering of notices happens in the notice service on top of this.
 */
export function authorize(actor: PolicyActor, action: PolicyAction, resource: PolicyResource): boolean {
  const rule = RULES[resource][action];
  return rule ? rule(actor) : false;
}
