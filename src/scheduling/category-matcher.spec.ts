import { EventCategory } from '../common/types';
import { matchCategory } from './category-matcher';

const interview: EventCategory = { id: 1, title: 'Interview', slug: 'interview', lengthInMinutes: 60 };
const prep: EventCategory = { id: 2, title: 'Interview Prep', slug: 'interview-prep', lengthInMinutes: 30 };
const intro: EventCategory = { id: 3, title: 'Intro Call', slug: '15min', lengthInMinutes: 15 };
const categories = [prep, interview, intro];

describe('matchCategory', () => {
  it('prefers an exact title over a substring match', () => {
    expect(matchCategory(categories, 'interview')).toEqual({ kind: 'matched', category: interview, matchedBy: 'exact' });
  });

  it('matches a slug with dashes as words', () => {
    expect(matchCategory(categories, 'Interview-Prep')).toEqual({ kind: 'matched', category: prep, matchedBy: 'exact' });
    expect(matchCategory(categories, '15min')).toEqual({ kind: 'matched', category: intro, matchedBy: 'exact' });
  });

  it('matches a substring in either direction', () => {
    expect(matchCategory(categories, 'intro')).toEqual({ kind: 'matched', category: intro, matchedBy: 'substring' });
    expect(matchCategory(categories, 'interview prep session')).toEqual({
      kind: 'matched',
      category: prep,
      matchedBy: 'substring',
    });
  });

  it('falls back to the first category without a reason', () => {
    expect(matchCategory(categories)).toEqual({ kind: 'matched', category: prep, matchedBy: 'default' });
    expect(matchCategory(categories, '   ')).toEqual({ kind: 'matched', category: prep, matchedBy: 'default' });
  });

  it('asks for a selection when the reason matches nothing', () => {
    expect(matchCategory(categories, 'dentist')).toEqual({ kind: 'needs_selection', options: categories });
  });

  it('reports an empty catalogue', () => {
    expect(matchCategory([], 'interview')).toEqual({ kind: 'empty' });
  });
});
