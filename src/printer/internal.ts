import Debug from 'debug';

export const debug = Debug('schemadesc');
