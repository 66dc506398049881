export * from './card.js';
export * from './player.js';
export * from './game.js';
export * from './messages.js';
