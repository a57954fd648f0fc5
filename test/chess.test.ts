import { describe, it, expect, vi } from 'vitest';
import { ChessBoard, Piece, runChessDemo } from '../examples/chess';
import type { PlacedPiece } from '../examples/chess';
import { CheckedZobristHashSet } from '../src/zobrist-set';
import { SetBehaviorError } from '../src/errors';

describe('chess board fingerprint', () => {
    it('restores the opening fingerprint after a pawn is lifted and put back', () => {
        const board = new ChessBoard();
        board.initialize();
        const initial = board.hash();
        expect(initial).not.toBe(0n);

        board.setPiece(1, 0, null);
        expect(board.hash()).not.toBe(initial);

        board.setPiece(1, 0, Piece.WhitePawn);
        expect(board.hash()).toBe(initial);
    });

    it('depends on where a piece stands', () => {
        const board = new ChessBoard();
        board.initialize();
        const initial = board.hash();

        board.setPiece(1, 4, null);
        board.setPiece(3, 4, Piece.WhitePawn);
        expect(board.hash()).not.toBe(initial);
        expect(board.get(3, 4)).toBe(Piece.WhitePawn);
    });

    it('gives the same fingerprint with a checked set', () => {
        const plain = new ChessBoard();
        const checked = new ChessBoard(CheckedZobristHashSet.empty<PlacedPiece>());
        plain.initialize();
        checked.initialize();
        expect(checked.hash()).toBe(plain.hash());

        checked.setPiece(0, 4, Piece.WhiteQueen);
        plain.setPiece(0, 4, Piece.WhiteQueen);
        expect(checked.hash()).toBe(plain.hash());
    });

    it('reaches the zero fingerprint once the board is cleared', () => {
        const board = new ChessBoard(CheckedZobristHashSet.empty<PlacedPiece>());
        board.initialize();
        for (const row of [0, 1, 6, 7]) {
            for (let column = 0; column < 8; column++) {
                board.setPiece(row, column, null);
            }
        }
        expect(board.hash()).toBe(0n);
    });

    it('lets a checked set catch bookkeeping bugs', () => {
        const zobrist = CheckedZobristHashSet.empty<PlacedPiece>();
        const board = new ChessBoard(zobrist);
        board.setPiece(2, 2, Piece.BlackKnight);
        expect(() => zobrist.add([2, 2, Piece.BlackKnight])).toThrow(SetBehaviorError);
    });

    it('logs every step of the demo', () => {
        const log = vi.fn();
        const result = runChessDemo(log);
        expect(log).toHaveBeenCalledTimes(3);
        expect(log.mock.calls[0][0]).toBe(`initial position:  0x${result.initial.toString(16)}`);
        expect(result.afterMove).not.toBe(result.initial);
        expect(result.afterReset).toBe(result.initial);
    });
});
