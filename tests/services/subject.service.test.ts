import { createTestContext, TestContext } from '../utils/testApp';

describe('SubjectService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('numbers subjects per department and semester', async () => {
    const first = await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    const second = await ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 });
    const other = await ctx.services.subjects.create({ name: 'Circuits', department: 'EE', semester: 1 });
    const third = await ctx.services.subjects.create({ name: 'Digital Logic', department: 'CS', semester: 1 });

    expect([first.subjectCode, second.subjectCode, third.subjectCode]).toEqual(['CS101', 'CS102', 'CS103']);
    expect(other.subjectCode).toBe('EE101');
    expect(first.departmentName).toBe('Computer Science & Engineering');
  });

  it('gives concurrent creations distinct codes', async () => {
    const created = await Promise.all(
      ['Algebra', 'Physics', 'Chemistry'].map((name) =>
        ctx.services.subjects.create({ name, department: 'IT', semester: 2 })
      )
    );

    expect(created.map((subject) => subject.subjectCode).sort()).toEqual(['IT201', 'IT202', 'IT203']);
  });

  it('retries when another writer took the code first', async () => {
    await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    const listCodes = jest.spyOn(ctx.store.subjects, 'listCodes').mockResolvedValueOnce([]);

    const subject = await ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 });

    expect(subject.subjectCode).toBe('CS102');
    expect(listCodes).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of attempts', async () => {
    ctx = createTestContext({ SUBJECT_CODE_MAX_ATTEMPTS: '2' });
    await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    jest.spyOn(ctx.store.subjects, 'listCodes').mockResolvedValue([]);

    await expect(
      ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 })
    ).rejects.toMatchObject({ statusCode: 409, message: 'Could not assign a unique subject code; please try again.' });
  });

  it('rejects a duplicate name within the same department and semester', async () => {
    await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });

    await expect(
      ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 })
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { name: ['Subject with this name already exists for this department and semester.'] },
    });
    const elsewhere = await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 2 });
    expect(elsewhere.subjectCode).toBe('CS201');
  });

  it('keeps the code when the subject changes semester', async () => {
    const subject = await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });

    const moved = await ctx.services.subjects.update(subject.id, { semester: 3 });

    expect(moved).toMatchObject({ semester: 3, subjectCode: 'CS101' });
  });

  it('keeps numbering a pair after a subject from another semester moves in', async () => {
    await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    const compilers = await ctx.services.subjects.create({ name: 'Compilers', department: 'CS', semester: 3 });
    await ctx.services.subjects.update(compilers.id, { semester: 1 });

    const next = await ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 });
    const after = await ctx.services.subjects.create({ name: 'Digital Logic', department: 'CS', semester: 1 });

    expect([next.subjectCode, after.subjectCode]).toEqual(['CS102', 'CS103']);
  });

  it('keeps numbering a pair after a subject from another department moves in', async () => {
    const signals = await ctx.services.subjects.create({ name: 'Signals', department: 'ECE', semester: 1 });
    await ctx.services.subjects.update(signals.id, { department: 'CS' });

    const first = await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    const second = await ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 });

    expect([first.subjectCode, second.subjectCode]).toEqual(['CS101', 'CS102']);
  });

  it('never reissues a code whose subject moved out of the pair', async () => {
    await ctx.services.subjects.create({ name: 'Programming I', department: 'CS', semester: 1 });
    const maths = await ctx.services.subjects.create({ name: 'Discrete Maths', department: 'CS', semester: 1 });
    await ctx.services.subjects.update(maths.id, { semester: 3 });

    const next = await ctx.services.subjects.create({ name: 'Digital Logic', department: 'CS', semester: 1 });
    const third = await ctx.services.subjects.create({ name: 'Compilers', department: 'CS', semester: 3 });

    expect(next.subjectCode).toBe('CS103');
    expect(third.subjectCode).toBe('CS301');
  });

  it('attaches and removes the syllabus with the subject', async () => {
    const subject = await ctx.services.subjects.create({
      name: 'Programming I',
      department: 'CS',
      semester: 1,
      pdfUrl: 'https://files.campus.test/cs101.pdf',
    });
    expect(subject.pdfUrl).toBe('https://files.campus.test/cs101.pdf');

    await ctx.services.subjects.delete(subject.id);

    expect(await ctx.store.syllabi.findBySubject(subject.id)).toBeNull();
    await expect(ctx.services.subjects.get(subject.id)).rejects.toMatchObject({ statusCode: 404 });
  });
});
