export { calculateAge, gamesStartDate, annotateAges } from './age-calculator'
export { buildMedalTally } from './medal-tally'
