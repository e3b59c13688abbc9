import dotenv from 'dotenv';
dotenv.config();

import type { Model } from 'mongoose';
import { z } from 'zod';
import connectDatabase, { disconnectDatabase } from '../config/database';
import logger, { errorMeta } from '../config/logger';
import { loadSettings } from '../config/settings';
import HeadOfDepartment from '../models/HeadOfDepartment.model';
import Notice from '../models/Notice.model';
import Staff from '../models/Staff.model';
import Student from '../models/Student.model';
import Subject from '../models/Subject.model';
import Syllabus from '../models/Syllabus.model';
import User from '../models/User.model';
import { MongoDataStore } from '../repositories/mongo';
import { createServices } from '../services';
import { NOTICE_CATEGORIES, NOTICE_PRIORITIES } from '../utils/constants';
import { catalogDepartment, personDepartment } from '../validators/common';
import rawSeed from './data.json';

const person = z.object({
  email: z.string().email(),
  firstName: z.string(),
  lastName: z.string(),
});

// The JSON is checked against the same vocabularies the API accepts.
const seedSchema = z.object({
  admin: person.extend({ password: z.string() }),
  staff: z.array(person.extend({ staffId: z.string(), department: personDepartment, designation: z.string() })),
  staffPassword: z.string(),
  hods: z.array(z.object({ staffId: z.string(), department: personDepartment, notes: z.string().nullable() })),
  students: z.array(person.extend({ studentId: z.string(), department: personDepartment })),
  studentPassword: z.string(),
  subjects: z.array(
    z.object({ name: z.string(), department: catalogDepartment, semester: z.number(), pdfUrl: z.string().optional() })
  ),
  notices: z.array(
    z.object({
      category: z.enum(NOTICE_CATEGORIES),
      title: z.string(),
      content: z.string().nullable(),
      priority: z.enum(NOTICE_PRIORITIES),
    })
  ),
});

const seedDatabase = async () => {
  try {
    const seed = seedSchema.parse(rawSeed);
    const settings = loadSettings();
    await connectDatabase(settings.mongoUri);
    logger.info('Connected to MongoDB for seeding');

    await Promise.all(
      [Notice, Syllabus, Subject, HeadOfDepartment, Student, Staff, User].map((model: Pick<Model<unknown>, 'deleteMany'>) => model.deleteMany({}))
    );
    logger.info('Cleared existing data');

    const store = new MongoDataStore();
    const services = createServices(store, settings);

    // Admins never come through the public registration endpoint.
    const admin = await store.users.create({
      email: seed.admin.email,
      passwordHash: await services.auth.hashPassword(seed.admin.password),
      firstName: seed.admin.firstName,
      lastName: seed.admin.lastName,
      role: 'admin',
      isStaff: true,
    });
    logger.info(`Created admin user: ${admin.email}`);

    const staffByCode = new Map<string, string>();
    for (const member of seed.staff) {
      const staff = await services.users.addStaff({ ...member, password: seed.staffPassword });
      staffByCode.set(staff.staffId, staff.userId);
    }
    logger.info(`Created ${staffByCode.size} staff users`);

    for (const hod of seed.hods) {
      const staffId = staffByCode.get(hod.staffId);
      if (!staffId) {
        throw new Error(`HOD seed names unknown staff ${hod.staffId}`);
      }
      await services.hods.appoint({ staffId, department: hod.department, notes: hod.notes });
    }
    logger.info(`Appointed ${seed.hods.length} HODs`);

    for (const student of seed.students) {
      await services.users.addStudent({ ...student, password: seed.studentPassword });
    }
    logger.info(`Created ${seed.students.length} student users`);

    for (const subject of seed.subjects) {
      await services.subjects.create(subject);
    }
    logger.info(`Seeded ${seed.subjects.length} subjects`);

    for (const notice of seed.notices) {
      await services.notices.create({ userId: admin.id }, notice);
    }
    logger.info(`Seeded ${seed.notices.length} notices`);

    logger.info('Database seeding completed successfully!');
    logger.info(`Admin: ${seed.admin.email} / ${seed.admin.password}`);
    logger.info(`Staff: ${seed.staff.map((member) => member.email).join(', ')} / ${seed.staffPassword}`);
    logger.info(`Students: ${seed.students.map((student) => student.email).join(', ')} / ${seed.studentPassword}`);

    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('Error seeding database', errorMeta(error));
    process.exit(1);
  }
};

void seedDatabase();
