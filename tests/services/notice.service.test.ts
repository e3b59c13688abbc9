import { createAdmin, createTestContext, TestContext } from '../utils/testApp';
import { minutesBefore } from '../../src/utils/helpers';

describe('NoticeService', () => {
  let ctx: TestContext;
  let authorId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    authorId = (await createAdmin(ctx)).user.id;
  });

  it('derives the audience from the category', async () => {
    const meeting = await ctx.services.notices.create({ userId: authorId }, { category: 'Staff Meeting', title: 'Monday' });
    const results = await ctx.services.notices.create({ userId: authorId }, { category: 'Results', title: 'Term 1' });

    expect(meeting.audience).toBe('staff');
    expect(results).toMatchObject({ audience: 'all', priority: 'normal', postedBy: authorId });
  });

  it('shows students only notices addressed to everyone', async () => {
    const meeting = await ctx.services.notices.create({ userId: authorId }, { category: 'Staff Meeting', title: 'Monday' });
    const results = await ctx.services.notices.create({ userId: authorId }, { category: 'Results', title: 'Term 1' });

    const forStudents = await ctx.services.notices.list({ role: 'student' });
    const forStaff = await ctx.services.notices.list({ role: 'staff' });

    expect(forStudents.items.map((notice) => notice.id)).toEqual([results.id]);
    expect(forStaff.items.map((notice) => notice.id)).toEqual([results.id, meeting.id]);
    await expect(ctx.services.notices.get({ role: 'student' }, meeting.id)).rejects.toMatchObject({
      statusCode: 403,
      message: 'You do not have permission to view this notice.',
    });
  });

  it('hides a notice without an audience from students', async () => {
    const unaddressed = await ctx.store.notices.create({
      category: 'Events',
      audience: null,
      title: 'Open day',
      content: null,
      date: null,
      datetime: null,
      priority: 'normal',
      postedBy: authorId,
      expiryDate: null,
    });

    await expect(ctx.services.notices.get({ role: 'student' }, unaddressed.id)).rejects.toMatchObject({
      statusCode: 403,
      code: 'FORBIDDEN',
      message: 'You do not have permission to view this notice.',
    });
    expect((await ctx.services.notices.list({ role: 'student' })).items).toEqual([]);
    expect((await ctx.services.notices.get({ role: 'staff' }, unaddressed.id)).title).toBe('Open day');
  });

  it('requires a title or content', async () => {
    await expect(
      ctx.services.notices.create({ userId: authorId }, { category: 'Events', title: '  ' })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'A notice needs a title or content.' });
  });

  it('re-derives the audience when the category changes', async () => {
    const notice = await ctx.services.notices.create({ userId: authorId }, { category: 'Events', content: 'Sports day' });

    const updated = await ctx.services.notices.update(notice.id, { category: 'Faculty Training' });
    const overridden = await ctx.services.notices.update(notice.id, { audience: 'all' });

    expect(updated.audience).toBe('staff');
    expect(overridden).toMatchObject({ category: 'Faculty Training', audience: 'all' });
  });

  it('purges notices created before the cutoff', async () => {
    const old = await ctx.services.notices.create({ userId: authorId }, { category: 'Events', title: 'Old' });
    const fresh = await ctx.services.notices.create({ userId: authorId }, { category: 'Events', title: 'Fresh' });
    ctx.store.ageNotice(old.id, minutesBefore(new Date(), 10));

    expect(await ctx.services.notices.purgeOlderThan(minutesBefore(new Date(), 5))).toBe(1);
    expect(await ctx.services.notices.purgeOlderThan(minutesBefore(new Date(), 5))).toBe(0);
    expect((await ctx.services.notices.list({ role: 'admin' })).items.map((notice) => notice.id)).toEqual([fresh.id]);
  });
});
