import { defineAction, terminate } from './action.js';

export const sessionActions = {
  bye: defineAction({
    arity: 0,
    description: 'End the session',
    run: async () => terminate(),
  }),
};
