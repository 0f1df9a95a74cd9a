/* ======================================================= *
Copyright © 2025 suog, Konishi Kento.
All rights reserved.

This work is protected by applicable copyright laws. 

No permission is granted to copy, reproduce, modify, distribute, publish, transmit, sublicense, 
or otherwise exploit this work, in whole or in part, in any form or by any means, 
without the prior explicit written consent of the copyright holder.
Use of this work for training, fine-tuning, evaluating, benchmarking, or otherwise developing or 
improving machine learning systems, including generative or foundation models, is expressly prohibited.
This includes any incorporation of this work or any derivative thereof into datasets or pipelines 
used for automated learning or model development. Any false attribution, misrepresentation of origin,
or removal or alteration of this notice is prohibited and constitutes an infringement of the author's moral rights. 

No license or other rights are granted by implication, estoppel, or otherwise.
All rights not expressly granted are reserved by the author.
 ======================================================= */

// FILE: tests/fixtures/positions.ts

import { BLACK, Board, WHITE } from "@/lib/othello"

const bit = (size: number, x: number, y: number) => 1n << BigInt(y * size + x)

/**
 * 6x6, black to move. a1 and a3 are black, b1 and b3 white.
 * Black can take c1 or c3; taking c1 leaves white without a move.
 */
export function forcedPassSetup(): Board {
    return new Board(6, {
        black: bit(6, 0, 0) | bit(6, 0, 2),
        white: bit(6, 1, 0) | bit(6, 1, 2),
        currentPlayer: BLACK,
    })
}

/** 6x6, white to move without a legal move while black still has c3. */
export function whiteMustPass(): Board {
    return new Board(6, {
        black: bit(6, 0, 0) | bit(6, 1, 0) | bit(6, 2, 0) | bit(6, 0, 2),
        white: bit(6, 1, 2),
        currentPlayer: WHITE,
    })
}

/** 6x6 with black on every cell but the last; nobody can move. */
export function finishedBoard(): Board {
    return new Board(6, { black: (1n << 35n) - 1n, white: 0n, currentPlayer: WHITE })
}

/** 6x6 filled with black except a white a1 corner. */
export function cornerHeldBoard(): Board {
    return new Board(6, { black: (1n << 36n) - 2n, white: 1n, currentPlayer: BLACK })
}

/** Plays the first legal move in scan order until the game ends. */
export function playOut(board: Board): Board {
    while (!board.isGameOver()) {
        const [first] = board.legalMoveList()
        if (first) board.play(first.x, first.y)
        else board.play(-1, -1)
    }
    return board
}

export const OPENING_6 = [
    "X",
    "_ _ _ _ _ _",
    "_ _ _ _ _ _",
    "_ _ O X _ _",
    "_ _ X O _ _",
    "_ _ _ _ _ _",
    "_ _ _ _ _ _",
].join("\n")
