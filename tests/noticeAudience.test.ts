import { NOTICE_CATEGORY_AUDIENCE } from '../src/utils/constants';
import { createAudienceResolver } from '../src/utils/noticeAudience';

const resolver = createAudienceResolver(NOTICE_CATEGORY_AUDIENCE);

describe('notice audience resolver', () => {
  it('derives the audience from the category table', () => {
    expect(resolver.forCategory('Staff Meeting')).toBe('staff');
    expect(resolver.forCategory('Exam Timetable')).toBe('all');
  });

  it('prefers an explicit audience on create', () => {
    expect(resolver.onCreate('Staff Meeting', 'all')).toBe('all');
    expect(resolver.onCreate('Results')).toBe('all');
  });

  it('re-derives on a category change and keeps the stored value otherwise', () => {
    const stored = { category: 'Events', audience: 'all' as const };
    expect(resolver.onUpdate(stored, { category: 'Staff Meeting' })).toBe('staff');
    expect(resolver.onUpdate(stored, {})).toBe('all');
    expect(resolver.onUpdate(stored, { audience: 'staff' })).toBe('staff');
  });

  it('reads categories from the table it is given', () => {
    const custom = createAudienceResolver({ 'Lab Closure': 'staff' });
    expect(custom.forCategory('Lab Closure')).toBe('staff');
    expect(custom.forCategory('Staff Meeting')).toBeNull();
  });

  it('leaves an unknown category without an audience across updates', () => {
    const custom = createAudienceResolver({ 'Lab Closure': 'staff' });
    const stored = { category: 'Events', audience: null };

    expect(custom.onCreate('Events')).toBeNull();
    expect(custom.onUpdate(stored, {})).toBeNull();
    expect(custom.onUpdate(stored, {})).toBeNull();
    expect(custom.onUpdate(stored, { category: 'Exam Timetable' })).toBeNull();
    expect(custom.onUpdate(stored, { category: 'Lab Closure' })).toBe('staff');
  });
});
