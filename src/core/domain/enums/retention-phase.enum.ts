export enum RetentionPhase {
  IDLE = 'idle',
  WAIT = 'wait',
  SWEEP = 'sweep',
  STOPPED = 'stopped',
}
