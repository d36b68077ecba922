import {
  insecurityScore,
  median,
  rankByInsecurity,
  rankByNorwood,
} from './leaderboard.rules';

describe('leaderboard rules', () => {
  describe('median', () => {
    it('takes the middle of an odd list', () => {
      expect(median([5, 2, 3])).toBe(3);
    });

    it('averages the middle pair of an even list', () => {
      expect(median([4, 2, 3, 6])).toBe(3.5);
    });

    it('rejects an empty list', () => {
      expect(() => median([])).toThrow(RangeError);
    });
  });

  describe('rankByNorwood', () => {
    const standings = [
      { username: 'Ari', stages: [2, 2, 3] },
      { username: 'Bo', stages: [5, 6] },
      { username: 'Cy', stages: [2] },
      { username: 'Dee', stages: [] },
    ];

    it('puts the lowest median first and breaks ties by analysis count', () => {
      expect(rankByNorwood(standings, 'best', 5)).toEqual([
        { username: 'Ari', norwoodStage: 2 },
        { username: 'Cy', norwoodStage: 2 },
        { username: 'Bo', norwoodStage: 6 },
      ]);
    });

    it('puts the highest median first for the worst board', () => {
      expect(rankByNorwood(standings, 'worst', 2)).toEqual([
        { username: 'Bo', norwoodStage: 6 },
        { username: 'Ari', norwoodStage: 2 },
      ]);
    });
  });

  it('weights certifications, analyses and sessions', () => {
    expect(
      insecurityScore({ username: 'Ari', certifications: 1, analyses: 3, sessions: 2 }),
    ).toBe(90);
  });

  it('ranks by insecurity and drops users with no activity', () => {
    expect(
      rankByInsecurity(
        [
          { username: 'Ari', certifications: 0, analyses: 1, sessions: 0 },
          { username: 'Bo', certifications: 1, analyses: 0, sessions: 0 },
          { username: 'Cy', certifications: 0, analyses: 0, sessions: 0 },
        ],
        10,
      ),
    ).toEqual([
      { username: 'Bo', score: 50 },
      { username: 'Ari', score: 10 },
    ]);
  });
});
