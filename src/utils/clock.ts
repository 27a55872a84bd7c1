export type Clock = () => Date;

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = () => new Date();

export const clockProvider = { provide: CLOCK, useValue: systemClock };
