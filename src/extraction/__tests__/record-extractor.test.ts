import { RecordExtractor, segmentText } from '../record-extractor';
import { normalize } from '../../ocr/normalizer';

describe('segmentText', () => {
  it('splits on blank lines and drops empty segments', () => {
    expect(segmentText('a\n\n  \nb\n\n')).toEqual(['a', 'b']);
  });
});

describe('RecordExtractor', () => {
  const extractor = new RecordExtractor();

  it('returns one record for a voter line repeated on the page', () => {
    const line = 'Name: A, Age: 30, Sl No: 1';
    const result = extractor.extract(`${line}\n${line}`, 1);

    expect(result.records).toEqual([
      { name: 'A', age: '30', ageGroup: '30-45', serialNo: '1', pageIndex: 1 },
    ]);
    expect(result.duplicatesRemoved).toBe(1);
    expect(result.segments).toEqual([{ index: 0, matcher: 'strict-layout', recordCount: 1 }]);
  });

  it('deduplicates across segments ignoring name case', () => {
    const result = extractor.extract('Name: Ravi, Age: 30, Sl No: 4\n\nName: RAVI, Age: 31, Sl No: 4', 2);

    expect(result.records).toHaveLength(1);
    expect(result.records[0].age).toBe('30');
    expect(result.segments[1]).toEqual({ index: 1, matcher: 'strict-layout', recordCount: 0 });
  });

  it('falls back from strict to keyword to heuristic per segment', () => {
    const text = [
      'Name: A, Age: 30, Sl No: 1',
      '',
      'Name Meena Age 25 Sl No 9',
      '',
      '3 ABC1234567 Ramesh Kumar s/o Suresh 45 years Male',
      '',
      '|||| ~~~',
    ].join('\n');

    const result = extractor.extract(text, 1);

    expect(result.segments.map(segment => segment.matcher)).toEqual([
      'strict-layout',
      'keyword',
      'heuristic-block',
      null,
    ]);
    expect(result.records.map(record => record.name)).toEqual(['A', 'Meena', 'Ramesh Kumar']);
  });

  it('never emits a record without a name or serial number', () => {
    const text = 'Age: 40 Gender: Male\n\nName: 123, Age: 30\n\nXYZ7654321 Male 50 years\n\nName: B, Age: 22, Sl No: 8';

    const { records } = extractor.extract(text, 1);

    expect(records.length).toBeGreaterThan(0);
    for (const record of records) {
      expect(Boolean(record.name) || Boolean(record.serialNo)).toBe(true);
    }
  });

  it('pairs each voter with the serial number printed before the name', () => {
    const { records } = extractor.extract(normalize('Sl No: 1 Name: Ravi Age: 30\nSl No: 2 Name: Sita Age: 40'), 1);

    expect(records.map(record => [record.name, record.serialNo])).toEqual([
      ['Ravi', '1'],
      ['Sita', '2'],
    ]);
  });

  it('keeps a record that only has a labelled serial number', () => {
    const result = extractor.extract(normalize('Sl No: 5, Age: 30, Gender: Male'), 1);

    expect(result.records).toEqual([{ serialNo: '5', age: '30', ageGroup: '30-45', gender: 'M', pageIndex: 1 }]);
    expect(result.segments).toEqual([{ index: 0, matcher: 'heuristic-block', recordCount: 1 }]);
  });

  it('returns nothing for empty text', () => {
    expect(extractor.extract('', 4)).toEqual({ records: [], segments: [], duplicatesRemoved: 0 });
  });
});
