// Error messages, keyed by the code reported to clients
export const GameErrors = {
  OutOfTurn: 'Not your turn',
  InvalidPhase: 'Action not allowed in the current phase',
  InvalidBidAmount: 'Invalid bid amount',
  BiddingAlreadyClosed: 'Bidding is already closed',
  InvalidTrumpCard: 'Trump card must be in your hand and of the selected suit',
  RevealNotAllowed: 'Trump cannot be revealed now',
  ExchangeNotAllowed: 'Card exchange not allowed',
  IllegalCard: 'Illegal card',
  InvalidMode: 'Mode must be 2, 3, or 4',
  StaleAction: 'Action is out of date',
  GameFull: 'Game is full',
  NotEnoughPlayers: 'Not enough players',
  PlayerNotFound: 'Player not found',
  RoomNotFound: 'Game not found',
} as const;

export type GameErrorCode = keyof typeof GameErrors;

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string = GameErrors[code]) {
    super(message);
    this.name = 'GameError';
    this.code = code;
  }
}
