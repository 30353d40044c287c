export interface ClubSuggestion {
  club: string;
  explanation: string;
}

export interface WindConditions {
  speed: string;
  direction: string;
  recommendation: string;
}

interface DistanceBand extends ClubSuggestion {
  /** Exclusive upper bound in yards */
  below: number;
}

const DISTANCE_BANDS: readonly DistanceBand[] = [
  { below: 100, club: 'Wedge', explanation: 'For short distances under 100 yards, a wedge is appropriate.' },
  { below: 150, club: '9 Iron', explanation: 'For distances between 100-150 yards, a 9 iron is a good choice.' },
  { below: 180, club: '7 Iron', explanation: 'For distances between 150-180 yards, a 7 iron is recommended.' },
  { below: 220, club: '5 Iron', explanation: 'For distances between 180-220 yards, a 5 iron provides good distance.' },
];

const DRIVER: ClubSuggestion = {
  club: 'Driver',
  explanation: 'For distances over 220 yards, use your driver for maximum distance.',
};

/**
 * Suggest a club for a distance in yards
 */
export function suggestClub(distance: number): ClubSuggestion {
  const band = DISTANCE_BANDS.find((b) => distance < b.below);
  if (!band) return { ...DRIVER };
  return { club: band.club, explanation: band.explanation };
}

/**
 * Wind conditions on the course. Static until a weather source is wired in.
 */
export function getWindConditions(): WindConditions {
  return {
    speed: '10 mph',
    direction: 'North-East',
    recommendation: 'Adjust your aim slightly to the left to account for the crosswind.',
  };
}
