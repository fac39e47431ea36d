export {
  computeSma,
  computeRsi,
  computeBands,
  computeAtr,
  lastValue,
} from './indicators';
