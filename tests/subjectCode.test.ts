import { compareSubjectCodes, nextSubjectCode } from '../src/utils/subjectCode';

describe('nextSubjectCode', () => {
  it('starts a department and semester at 01', () => {
    expect(nextSubjectCode('CS', 1, [])).toBe('CS101');
    expect(nextSubjectCode('mech', 4, [])).toBe('MECH401');
  });

  it('continues after the greatest issued code', () => {
    expect(nextSubjectCode('CS', 1, ['CS101', 'CS103', 'CS102'])).toBe('CS104');
  });

  it('widens past 99 without capping', () => {
    expect(nextSubjectCode('CS', 1, ['CS198', 'CS199'])).toBe('CS1100');
    expect(nextSubjectCode('CS', 1, ['CS199', 'CS1100'])).toBe('CS1101');
  });

  it('ignores codes with an unparseable suffix', () => {
    expect(nextSubjectCode('CS', 1, ['CS1XY'])).toBe('CS101');
    expect(nextSubjectCode('CS', 1, ['CS101', 'CS1XY'])).toBe('CS102');
  });

  it('ignores codes issued under another department or semester', () => {
    expect(nextSubjectCode('CS', 1, ['CS101', 'CS301', 'ECE101'])).toBe('CS102');
    expect(nextSubjectCode('CS', 1, ['CS301', 'ECE199'])).toBe('CS101');
  });
});

test('compareSubjectCodes ranks shorter codes first', () => {
  expect(['CS1100', 'CS102', 'CS199'].sort(compareSubjectCodes)).toEqual(['CS102', 'CS199', 'CS1100']);
  expect(compareSubjectCodes('CS101', 'CS101')).toBe(0);
});
