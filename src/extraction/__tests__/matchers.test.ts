import { StrictLayoutMatcher } from '../matchers/strict-layout-matcher';
import { KeywordMatcher, splitAtNameLabels } from '../matchers/keyword-matcher';
import { HeuristicBlockMatcher, splitAtBoundaries } from '../matchers/heuristic-block-matcher';
import { structuralProbe } from '../structural-probe';

describe('StrictLayoutMatcher', () => {
  const matcher = new StrictLayoutMatcher();

  it('reads the minimal comma-delimited line', () => {
    expect(matcher.tryMatch('Name: A, Age: 30, Sl No: 1', 1)).toEqual([
      { name: 'A', age: '30', ageGroup: '30-45', serialNo: '1', pageIndex: 1 },
    ]);
  });

  it('reads every optional field in order', () => {
    const line =
      "Name: Ravi Kumar, Father's Name: Mohan Lal, House No: 12B, Age: 45, Gender: Male, Sl No: 17, EPIC: ABC1234567";

    expect(matcher.tryMatch(line)).toEqual([{
      name: 'Ravi Kumar',
      relationType: 'Father',
      relationName: 'Mohan Lal',
      houseNo: '12B',
      age: '45',
      ageGroup: '30-45',
      gender: 'M',
      serialNo: '17',
      epic: 'ABC1234567',
    }]);
  });

  it('returns null when no line fits the layout', () => {
    expect(matcher.tryMatch('Ravi Kumar 45 Male')).toBeNull();
  });
});

describe('KeywordMatcher', () => {
  const matcher = new KeywordMatcher();

  it('splits a segment at each voter name label', () => {
    const segment = [
      'Name: Sunita Devi',
      "Husband's Name: Ram Prasad",
      'Age: 52 Gender: Female',
      'Name: Gopal',
      "Father's Name: Hari",
      'Age: 33 Gender: Male',
    ].join('\n');

    expect(splitAtNameLabels(segment)).toHaveLength(2);
    expect(matcher.tryMatch(segment, 3)).toEqual([
      {
        name: 'Sunita Devi',
        relationType: 'Husband',
        relationName: 'Ram Prasad',
        age: '52',
        ageGroup: '45+',
        gender: 'F',
        pageIndex: 3,
      },
      {
        name: 'Gopal',
        relationType: 'Father',
        relationName: 'Hari',
        age: '33',
        ageGroup: '30-45',
        gender: 'M',
        pageIndex: 3,
      },
    ]);
  });

  it('keeps a serial number and EPIC id from the line above the name', () => {
    expect(matcher.tryMatch('12 ABC1234567\nName: Meena\nAge: 25')).toEqual([
      { serialNo: '12', epic: 'ABC1234567', name: 'Meena', age: '25', ageGroup: '18-29' },
    ]);
  });

  it('keeps a labelled serial number with the name that follows it', () => {
    expect(matcher.tryMatch('Sl No: 1 Name: Ravi Age: 30\nSl No: 2 Name: Sita Age: 40')).toEqual([
      { serialNo: '1', name: 'Ravi', age: '30', ageGroup: '30-45' },
      { serialNo: '2', name: 'Sita', age: '40', ageGroup: '30-45' },
    ]);
  });

  it('keeps a labelled serial number from the line above the name', () => {
    const segment = 'Sl No: 3\nName: Meena Age: 25\nSl No: 4\nName: Gopal Age: 50';

    expect(splitAtNameLabels(segment)).toEqual(['Sl No: 3\nName: Meena Age: 25', 'Sl No: 4\nName: Gopal Age: 50']);
    expect(matcher.tryMatch(segment)?.map(record => [record.name, record.serialNo])).toEqual([
      ['Meena', '3'],
      ['Gopal', '4'],
    ]);
  });

  it('reads labels without delimiters', () => {
    expect(matcher.tryMatch('Name Meena Age 25 Sl No 9')).toEqual([
      { name: 'Meena', age: '25', ageGroup: '18-29', serialNo: '9' },
    ]);
  });

  it('returns null without a name label', () => {
    expect(matcher.tryMatch('Age: 40 Gender: Male')).toBeNull();
  });
});

describe('HeuristicBlockMatcher', () => {
  const matcher = new HeuristicBlockMatcher();

  it('classifies unlabelled tokens per record block', () => {
    const segment = [
      '1 ABC1234567 Ramesh Kumar s/o Suresh 45 years Male',
      '2 XYZ7654321 Anita w/o Ramesh 39 years F',
    ].join('\n');

    expect(splitAtBoundaries(segment)).toHaveLength(2);
    expect(matcher.tryMatch(segment)).toEqual([
      {
        serialNo: '1',
        epic: 'ABC1234567',
        name: 'Ramesh Kumar',
        relationType: 'Father',
        relationName: 'Suresh',
        age: '45',
        ageGroup: '30-45',
        gender: 'M',
      },
      {
        serialNo: '2',
        epic: 'XYZ7654321',
        name: 'Anita',
        relationType: 'Husband',
        relationName: 'Ramesh',
        age: '39',
        ageGroup: '30-45',
        gender: 'F',
      },
    ]);
  });

  it('keeps a block with a labelled serial number but no name', () => {
    expect(matcher.tryMatch('Sl No: 5, Age: 30, Gender: Male', 2)).toEqual([
      { serialNo: '5', age: '30', ageGroup: '30-45', gender: 'M', pageIndex: 2 },
    ]);
  });

  it('discards blocks it cannot classify', () => {
    expect(matcher.tryMatch('Photo Available')).toBeNull();
  });
});

describe('structuralProbe', () => {
  it('counts lines with an identity and a detail', () => {
    const text = 'Name: A, Age: 30, Sl No: 1\nrandom words\nABC1234567 45 years';

    expect(structuralProbe(text)).toBe(2);
  });

  it('ignores identity lines without a detail', () => {
    expect(structuralProbe('Name: only')).toBe(0);
    expect(structuralProbe('')).toBe(0);
  });
});
