export { readValveState, readAllValves, setValveState } from './valves';
export {
  portToChannel,
  levelToState,
  stateToLevel,
  toggledState,
  formatValveState,
  valveLabel,
} from './helpers';
