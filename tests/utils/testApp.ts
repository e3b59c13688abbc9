import { Express } from 'express';
import { createApp } from '../../src/app';
import { loadSettings, Settings } from '../../src/config/settings';
import { createServices, Services } from '../../src/services';
import { StaffView, StudentView } from '../../src/services/user.service';
import { PersonDepartment, UserRecord } from '../../src/types';
import { MemoryDataStore } from './memoryStore';

export const TEST_PASSWORD = 'Passw0rd!';

export interface TestContext {
  store: MemoryDataStore;
  services: Services;
  settings: Settings;
  app: Express;
}

export function createTestContext(env: NodeJS.ProcessEnv = {}): TestContext {
  const settings = loadSettings({ NODE_ENV: 'test', BCRYPT_SALT_ROUNDS: '4', ...env });
  const store = new MemoryDataStore();
  const services = createServices(store, settings);
  return { store, services, settings, app: createApp(services, settings) };
}

export const bearer = (token: string): string => `Bearer ${token}`;

export async function createAdmin(
  ctx: TestContext,
  email = 'admin@campus.test'
): Promise<{ user: UserRecord; token: string }> {
  const user = await ctx.store.users.create({
    email,
    passwordHash: await ctx.services.auth.hashPassword(TEST_PASSWORD),
    firstName: 'Ada',
    lastName: 'Admin',
    role: 'admin',
    isStaff: true,
  });
  return { user, token: ctx.services.auth.issueTokenPair(user).access };
}

export async function createStaffMember(
  ctx: TestContext,
  staffId: string,
  options: { firstName?: string; lastName?: string; department?: PersonDepartment } = {}
): Promise<{ staff: StaffView; token: string }> {
  const staff = await ctx.services.users.addStaff({
    email: `${staffId.toLowerCase()}@campus.test`,
    password: TEST_PASSWORD,
    firstName: options.firstName ?? 'Sam',
    lastName: options.lastName ?? staffId,
    staffId,
    department: options.department ?? 'CS',
  });
  return { staff, token: ctx.services.auth.issueTokenPair(staff.user).access };
}

export async function createStudent(
  ctx: TestContext,
  studentId: string,
  department: PersonDepartment = 'CS'
): Promise<{ student: StudentView; token: string }> {
  const student = await ctx.services.users.addStudent({
    email: `${studentId.toLowerCase()}@campus.test`,
    password: TEST_PASSWORD,
    firstName: 'Stu',
    lastName: studentId,
    studentId,
    department,
  });
  return { student, token: ctx.services.auth.issueTokenPair(student.user).access };
}
