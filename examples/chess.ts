/**
 * Chess board whose position fingerprint is kept by a `ZobristHashSet`.
 * Each occupied square contributes the element `(row, column, piece)`.
 */

import { ZobristHashSet } from '../src/index';

export enum Piece {
    WhitePawn,
    WhiteKnight,
    WhiteBishop,
    WhiteRook,
    WhiteQueen,
    WhiteKing,
    BlackPawn,
    BlackKnight,
    BlackBishop,
    BlackRook,
    BlackQueen,
    BlackKing,
}

export type PlacedPiece = readonly [row: number, column: number, piece: Piece];

export const BOARD_SIZE = 8;

const BACK_RANK_WHITE: readonly Piece[] = [
    Piece.WhiteRook, Piece.WhiteKnight, Piece.WhiteBishop, Piece.WhiteQueen,
    Piece.WhiteKing, Piece.WhiteBishop, Piece.WhiteKnight, Piece.WhiteRook,
];

const BACK_RANK_BLACK: readonly Piece[] = [
    Piece.BlackRook, Piece.BlackKnight, Piece.BlackBishop, Piece.BlackQueen,
    Piece.BlackKing, Piece.BlackBishop, Piece.BlackKnight, Piece.BlackRook,
];

export class ChessBoard {
    private readonly board: (Piece | null)[][];
    private readonly zobrist: ZobristHashSet<PlacedPiece>;

    /** Pass a `CheckedZobristHashSet` to validate every board update. */
    constructor(zobrist: ZobristHashSet<PlacedPiece> = ZobristHashSet.empty<PlacedPiece>()) {
        this.board = Array.from({ length: BOARD_SIZE }, () => new Array<Piece | null>(BOARD_SIZE).fill(null));
        this.zobrist = zobrist;
    }

    get(row: number, column: number): Piece | null {
        return this.board[row][column];
    }

    setPiece(row: number, column: number, piece: Piece | null): void {
        const old = this.board[row][column];
        if (old !== null) this.zobrist.remove([row, column, old]);
        if (piece !== null) this.zobrist.add([row, column, piece]);
        this.board[row][column] = piece;
    }

    /** Standard opening position: white on rows 0-1, black on rows 6-7. */
    initialize(): void {
        for (let i = 0; i < BOARD_SIZE; i++) {
            this.setPiece(0, i, BACK_RANK_WHITE[i]);
            this.setPiece(1, i, Piece.WhitePawn);
            this.setPiece(7, i, BACK_RANK_BLACK[i]);
            this.setPiece(6, i, Piece.BlackPawn);
        }
    }

    hash(): bigint {
        return this.zobrist.toBigInt();
    }
}

export interface ChessDemoResult {
    initial: bigint;
    afterMove: bigint;
    afterReset: bigint;
}

/** Sets up a board, lifts the a2 pawn, puts it back, and reports each fingerprint. */
export function runChessDemo(log: (line: string) => void = console.log): ChessDemoResult {
    const board = new ChessBoard();
    board.initialize();
    const initial = board.hash();
    log(`initial position:  0x${initial.toString(16)}`);

    board.setPiece(1, 0, null);
    const afterMove = board.hash();
    log(`pawn lifted:       0x${afterMove.toString(16)}`);

    board.setPiece(1, 0, Piece.WhitePawn);
    const afterReset = board.hash();
    log(`pawn restored:     0x${afterReset.toString(16)}`);

    return { initial, afterMove, afterReset };
}
