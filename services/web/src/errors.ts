export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class GameNotFoundError extends HttpError {
  constructor(readonly gameId: string) {
    super(404, 'Game not found');
  }
}

export class InvalidMoveError extends HttpError {
  constructor(message = 'Invalid move') {
    super(400, message);
  }
}
