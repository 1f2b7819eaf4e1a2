import createDebug from 'debug';

/**
 * Debug channels. Silent unless enabled, e.g. `DEBUG=deep-delta:*`.
 */
export const log = {
  differ: createDebug('deep-delta:differ'),
  lcs: createDebug('deep-delta:lcs'),
  best: createDebug('deep-delta:best')
};
