import { describe, it, expect } from 'vitest';
import { computeBlogScore, scoreBreakdown } from '../../../src/services/keywords/scorer.js';

describe('blog score', () => {
  it('scores an informational question keyword', () => {
    expect(
      computeBlogScore({
        text: 'how to network effectively',
        monthlySearches: 1000,
        competitionIndex: 45,
        intent: 'informational',
        isQuestion: true,
        isBranded: false,
      })
    ).toBe(75);
  });

  it('penalises branded keywords and defaults missing competition to the midpoint', () => {
    const input = {
      text: 'is vistaprint good',
      monthlySearches: 5000,
      competitionIndex: null,
      intent: 'navigational' as const,
      isQuestion: false,
      isBranded: true,
    };

    expect(scoreBreakdown(input)).toEqual({
      volume: 25,
      competition: 20,
      intent: 0,
      questionBonus: 0,
      brandedPenalty: -30,
      lowValuePenalty: 0,
    });
    expect(computeBlogScore(input)).toBe(15);
  });

  it('never goes below zero', () => {
    expect(
      computeBlogScore({
        text: 'card holder',
        monthlySearches: 50,
        competitionIndex: 90,
        intent: 'transactional',
        isBranded: true,
      })
    ).toBe(0);
  });

  it('gives an absent intent the neutral weight', () => {
    expect(scoreBreakdown({ text: 'cards' })).toEqual({
      volume: 5,
      competition: 20,
      intent: 10,
      questionBonus: 0,
      brandedPenalty: 0,
      lowValuePenalty: 0,
    });
    expect(computeBlogScore({ text: 'cards' })).toBe(35);
  });

  it.each([
    [10_000, 30],
    [9999, 25],
    [5000, 25],
    [1000, 20],
    [500, 15],
    [100, 10],
    [99, 5],
  ])('awards %i monthly searches %i volume points', (monthlySearches, points) => {
    expect(scoreBreakdown({ text: 'cards', monthlySearches }).volume).toBe(points);
  });

  it.each([
    [0, 25],
    [30, 25],
    [31, 20],
    [50, 20],
    [70, 15],
    [85, 10],
    [86, 5],
  ])('awards competition index %i %i points', (competitionIndex, points) => {
    expect(scoreBreakdown({ text: 'cards', competitionIndex }).competition).toBe(points);
  });

  it('applies the low-value penalty from the text alone', () => {
    expect(scoreBreakdown({ text: 'Business Card Case' }).lowValuePenalty).toBe(-40);
  });
});
