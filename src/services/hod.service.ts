import logger from '../config/logger';
import { UniqueConstraintError } from '../repositories/errors';
import { DataStore, HodFilter } from '../repositories/types';
import { HodAppointment, ListResult, PersonDepartment } from '../types';
import { ApiError } from '../utils/ApiError';
import { personDepartmentName } from '../utils/departments';
import { daysBetween, fullName } from '../utils/helpers';
import { ensureProfileRole } from './user.service';

export interface AppointInput {
  /** User id of the staff member. */
  staffId: string;
  department: PersonDepartment;
  startDate?: Date;
  notes?: string | null;
}

export interface AppointOptions {
  /** Retire the department's current head instead of refusing the appointment. */
  supersede?: boolean;
}

export interface HodChanges {
  department?: PersonDepartment;
  startDate?: Date;
  notes?: string | null;
  isActive?: boolean;
}

export interface HodView {
  id: string;
  staff: string;
  staffCode: string | null;
  staffName: string | null;
  department: PersonDepartment;
  departmentName: string;
  startDate: Date;
  endDate: Date | null;
  isActive: boolean;
  notes: string | null;
  durationDays: number;
  createdAt: Date;
  updatedAt: Date;
}

interface AppointContext extends AppointOptions {
  /** Appointment being replaced by a department change; excluded from the conflict checks. */
  replacing?: HodAppointment;
}

/** Head-of-department succession: appointment, in-place edits, and soft retirement. */
export class HodService {
  constructor(private readonly store: DataStore) {}

  async appoint(input: AppointInput, options: AppointOptions = {}): Promise<HodView> {
    const appointment = await this.conflictOnRace(() =>
      this.store.transaction((tx) => this.appointWithin(tx, input, options))
    );
    logger.info('HOD appointed', {
      hodId: appointment.id,
      staffId: appointment.staffId,
      department: appointment.department,
      supersede: Boolean(options.supersede),
    });
    return this.toView(appointment);
  }

  async update(id: string, changes: HodChanges): Promise<HodView> {
    const appointment = await this.conflictOnRace(() =>
      this.store.transaction(async (tx) => {
        const current = await this.requireAppointment(tx, id);

        if (current.status.state === 'retired') {
          if (changes.isActive === true) {
            throw ApiError.invalidField(
              'isActive',
              'A retired HOD appointment cannot be reactivated; appoint the staff member again.'
            );
          }
          const locked = (['department', 'startDate'] as const).filter((field) => changes[field] !== undefined);
          if (locked.length > 0) {
            throw ApiError.validation(
              'Only notes can be changed on a retired HOD appointment.',
              Object.fromEntries(locked.map((field) => [field, ['Cannot be changed on a retired appointment.']]))
            );
          }
          if (changes.notes === undefined) {
            return current;
          }
          return this.updated(await tx.hods.updateDetails(id, { notes: changes.notes }));
        }

        if (changes.isActive === false) {
          if (changes.department !== undefined && changes.department !== current.department) {
            throw ApiError.invalidField('department', 'Cannot change department while retiring an appointment.');
          }
          if (changes.startDate !== undefined || changes.notes !== undefined) {
            await tx.hods.updateDetails(id, { startDate: changes.startDate, notes: changes.notes });
          }
          const retired = this.updated(await tx.hods.retire(id, new Date()));
          logger.info('HOD retired', { hodId: id, department: retired.department });
          return retired;
        }

        if (changes.department !== undefined && changes.department !== current.department) {
          const moved = await this.appointWithin(
            tx,
            {
              staffId: current.staffId,
              department: changes.department,
              startDate: new Date(),
              notes: changes.notes !== undefined ? changes.notes : current.notes,
            },
            { replacing: current }
          );
          logger.info('HOD moved to another department', {
            previousId: current.id,
            hodId: moved.id,
            from: current.department,
            to: moved.department,
          });
          return moved;
        }

        if (changes.startDate === undefined && changes.notes === undefined) {
          return current;
        }
        return this.updated(
          await tx.hods.updateDetails(id, { startDate: changes.startDate, notes: changes.notes })
        );
      })
    );
    return this.toView(appointment);
  }

  /** Soft delete: the row stays as history. Retiring twice returns the record unchanged. */
  async retire(id: string): Promise<HodView> {
    const appointment = await this.store.transaction(async (tx) => {
      const current = await this.requireAppointment(tx, id);
      if (current.status.state === 'retired') {
        return current;
      }
      const retired = this.updated(await tx.hods.retire(id, new Date()));
      logger.info('HOD retired', { hodId: id, department: retired.department });
      return retired;
    });
    return this.toView(appointment);
  }

  async currentHod(department: PersonDepartment): Promise<HodView> {
    const appointment = await this.store.hods.findActiveByDepartment(department);
    if (!appointment) {
      throw ApiError.notFound(`No active HOD found for ${personDepartmentName(department)} department.`);
    }
    return this.toView(appointment);
  }

  async get(id: string): Promise<HodView> {
    return this.toView(await this.requireAppointment(this.store, id));
  }

  async list(filter: HodFilter = {}): Promise<ListResult<HodView>> {
    const appointments = await this.store.hods.list(filter);
    const items = await this.toViews(appointments);
    return { count: items.length, items };
  }

  private async appointWithin(
    tx: DataStore,
    input: AppointInput,
    context: AppointContext
  ): Promise<HodAppointment> {
    const staff = await tx.staff.findByUserId(input.staffId);
    if (!staff) {
      throw ApiError.notFound('Staff member not found.');
    }
    const user = await tx.users.findById(staff.userId);
    if (!user || !user.isActive) {
      throw ApiError.invalidField('staff', 'Cannot appoint an inactive staff member as HOD.');
    }

    const held = await tx.hods.findActiveByStaff(staff.userId);
    if (held && held.id !== context.replacing?.id) {
      throw ApiError.conflict(
        `${fullName(user)} is already the HOD of ${personDepartmentName(held.department)} department.`
      );
    }

    const incumbent = await tx.hods.findActiveByDepartment(input.department);
    if (incumbent && incumbent.id !== context.replacing?.id && !context.supersede) {
      const incumbentUser = await tx.users.findById(incumbent.staffId);
      const name = incumbentUser ? fullName(incumbentUser) : 'Another staff member';
      throw ApiError.conflict(`${name} is already the HOD of ${personDepartmentName(input.department)} department.`);
    }

    const now = new Date();
    if (context.replacing) {
      await tx.hods.retire(context.replacing.id, now);
    }
    if (context.supersede) {
      const superseded = await tx.hods.retireActiveInDepartment(input.department, now);
      if (superseded > 0) {
        logger.info('HOD superseded', { department: input.department, retired: superseded });
      }
    }

    await ensureProfileRole(tx.users, user, 'staff');
    return tx.hods.create({
      staffId: staff.userId,
      department: input.department,
      startDate: input.startDate ?? now,
      notes: input.notes ?? null,
    });
  }

  /** A unique-index rejection here means another appointment committed first. */
  private async conflictOnRace<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof UniqueConstraintError && error.entity === 'hod') {
        throw ApiError.conflict(
          error.involves('staffId')
            ? 'This staff member already holds an active HOD appointment.'
            : 'This department already has an active HOD.'
        );
      }
      throw error;
    }
  }

  private async requireAppointment(store: DataStore, id: string): Promise<HodAppointment> {
    const appointment = await store.hods.findById(id);
    if (!appointment) {
      throw ApiError.notFound('HOD record not found.');
    }
    return appointment;
  }

  private updated(appointment: HodAppointment | null): HodAppointment {
    if (!appointment) {
      throw ApiError.notFound('HOD record not found.');
    }
    return appointment;
  }

  private async toView(appointment: HodAppointment): Promise<HodView> {
    const [view] = await this.toViews([appointment]);
    return view;
  }

  private async toViews(appointments: HodAppointment[]): Promise<HodView[]> {
    const staffIds = [...new Set(appointments.map((appointment) => appointment.staffId))];
    const [profiles, users] = await Promise.all([
      this.store.staff.findByUserIds(staffIds),
      this.store.users.findByIds(staffIds),
    ]);
    const profileById = new Map(profiles.map((profile) => [profile.userId, profile]));
    const userById = new Map(users.map((user) => [user.id, user]));
    const now = new Date();

    return appointments.map((appointment) => {
      const profile = profileById.get(appointment.staffId);
      const user = userById.get(appointment.staffId);
      const endDate = appointment.status.state === 'retired' ? appointment.status.endDate : null;
      return {
        id: appointment.id,
        staff: appointment.staffId,
        staffCode: profile ? profile.staffId : null,
        staffName: profile && user ? fullName(user) : null,
        department: appointment.department,
        departmentName: personDepartmentName(appointment.department),
        startDate: appointment.startDate,
        endDate,
        isActive: appointment.status.state === 'active',
        notes: appointment.notes,
        durationDays: daysBetween(appointment.startDate, endDate ?? now),
        createdAt: appointment.createdAt,
        updatedAt: appointment.updatedAt,
      };
    });
  }
}
