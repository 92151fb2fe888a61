import { describe, it, expect } from 'vitest';
import { rankTerms } from '../engine/term-ranker.js';
import { EmptyInputError, InputError } from '../engine/errors.js';

function summarize(text: string) {
  return rankTerms(text).map((t) => [t.text, t.category, t.importance]);
}

describe('rankTerms', () => {
  it('rejects blank and whitespace-only input', () => {
    expect(() => rankTerms('')).toThrow(EmptyInputError);
    expect(() => rankTerms('  \n\t ')).toThrow(InputError);
  });

  it('classifies vocabulary terms and rewards early mentions', () => {
    expect(summarize('Python, SQL, Docker')).toEqual([
      ['python', 'skill', 1],
      ['sql', 'skill', 0.7],
      ['docker', 'tool', 0.7],
    ]);
  });

  it('weighs frequency, categories and "N+ years" qualifications', () => {
    const text = 'Senior engineer with 5+ years of Kubernetes. Kubernetes and Terraform required. Mentoring.';
    expect(summarize(text)).toEqual([
      ['kubernetes', 'tool', 0.7],
      ['5+ years', 'qualification', 0.585],
      ['senior', 'soft', 0.39],
      ['engineer', 'soft', 0.39],
      ['terraform', 'tool', 0.35],
      ['mentoring', 'soft', 0.21],
    ]);
  });

  it('keeps + and # so C++ and C# survive normalization', () => {
    expect(rankTerms('C++ and C# developers').map((t) => t.text)).toEqual(['c++', 'c#', 'developers']);
  });

  it('prefers multi-word phrases over their component words', () => {
    const texts = rankTerms('Machine learning engineers ship machine learning models').map((t) => t.text);
    expect(texts).toContain('machine learning');
    expect(texts).not.toContain('learning');
  });

  it('accepts a custom vocabulary', () => {
    const terms = rankTerms('We use graph databases', {
      vocabulary: { skill: ['graph databases'], tool: [], qualification: [], soft: [], stopwords: ['we', 'use'] },
    });
    expect(terms).toEqual([{ text: 'graph databases', category: 'skill', importance: 1 }]);
  });

  it('caps the output at max_terms', () => {
    const text = 'Python SQL Docker Kubernetes Terraform Kafka Airflow Spark';
    expect(rankTerms(text, { max_terms: 3 })).toHaveLength(3);
  });

  it('is idempotent', () => {
    const text = 'Data engineer: Airflow, dbt, Snowflake. Strong SQL and stakeholder communication.';
    expect(rankTerms(text)).toEqual(rankTerms(text));
  });
});
