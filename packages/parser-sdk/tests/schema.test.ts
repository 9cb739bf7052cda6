import { describe, it, expect, vi } from 'vitest';
import { normalizeWhitespace, validateJobRecords } from '../src/schema.js';

describe('normalizeWhitespace', () => {
  it('trims and collapses spaces and line breaks', () => {
    expect(normalizeWhitespace('  Data \n\t Engineer  ')).toBe('Data Engineer');
  });
});

describe('validateJobRecords', () => {
  it('keeps a complete listing and cleans its text fields', () => {
    const [job] = validateJobRecords([
      {
        id: 'j1',
        title: '  Data   Engineer ',
        company: 'Acme',
        salary: 75000,
        location: ' Pune, MH',
        skills: ['Python', ' SQL ', 3, ''],
        description: 'urgent hire',
        valid_until: '2024-06-01T00:00:00Z',
      },
    ]);

    expect(job).toEqual({
      id: 'j1',
      title: 'Data Engineer',
      company: 'Acme',
      salary: 75000,
      location: 'Pune, MH',
      skills: ['Python', 'SQL'],
      description: 'urgent hire',
      validUntil: '2024-06-01T00:00:00Z',
    });
  });

  it('falls back to the title when the id is absent, null or empty', () => {
    const jobs = validateJobRecords([
      { title: 'Analyst' },
      { id: null, title: 'Engineer' },
      { id: '', title: 'Designer' },
    ]);

    expect(jobs.map((job) => job.id)).toEqual(['Analyst', 'Engineer', 'Designer']);
  });

  it('stringifies numeric ids', () => {
    const [job] = validateJobRecords([{ id: 42, title: 'Engineer' }]);
    expect(job!.id).toBe('42');
  });

  it('keeps ids exactly as given', () => {
    const jobs = validateJobRecords([
      { id: 'job 1', title: 'Engineer' },
      { id: 'job  1', title: 'Engineer' },
      { id: ' job 1', title: 'Engineer' },
    ]);

    expect(jobs.map((job) => job.id)).toEqual(['job 1', 'job  1', ' job 1']);
  });

  it('drops listings whose id contains a line break', () => {
    const onInvalid = vi.fn();
    const jobs = validateJobRecords([{ id: 'abc\ndef', title: 'Engineer' }, { id: 'abc\r', title: 'Engineer' }], {
      onInvalid,
    });

    expect(jobs).toEqual([]);
    expect(onInvalid).toHaveBeenCalledTimes(2);
    expect(onInvalid.mock.calls[0]![0][0].message).toBe('job id contains a line break');
  });

  it('degrades malformed fields to their empty form', () => {
    const [job] = validateJobRecords([
      {
        id: 'j2',
        title: 'Engineer',
        company: ['Acme'],
        salary: '75k',
        location: 5,
        skills: 'python',
        description: null,
        valid_until: 20240601,
      },
    ]);

    expect(job).toEqual({
      id: 'j2',
      title: 'Engineer',
      company: '',
      salary: undefined,
      location: '',
      skills: [],
      description: '',
      validUntil: '',
    });
  });

  it('treats a null salary as absent', () => {
    const [job] = validateJobRecords([{ id: 'j3', title: 'Engineer', salary: null }]);
    expect(job!.salary).toBeUndefined();
  });

  it('drops listings with neither id nor title and reports them', () => {
    const onInvalid = vi.fn();
    const jobs = validateJobRecords([{ id: 'ok', title: 'Engineer' }, { company: 'Acme' }, null], { onInvalid });

    expect(jobs).toHaveLength(1);
    expect(onInvalid).toHaveBeenCalledTimes(2);

    const [issues, job, index] = onInvalid.mock.calls[0]!;
    expect(job).toEqual({ company: 'Acme' });
    expect(index).toBe(1);
    expect(issues[0].message).toBe('job has neither an id nor a title');
    expect(onInvalid.mock.calls[1]![2]).toBe(2);
  });
});
