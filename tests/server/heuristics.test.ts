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

// FILE: tests/server/heuristics.test.ts

import { describe, expect, it } from "vitest"
import { BLACK, Board, WHITE } from "@/lib/othello"
import { HEURISTICS, HEURISTIC_NAMES, allInOne, coinParity, cornersCaptured, mobility } from "@/server/heuristics"

describe("heuristics", () => {
    it("score the opening as even", () => {
        const board = new Board(8)
        for (const name of HEURISTIC_NAMES) {
            expect(HEURISTICS[name](board, BLACK)).toBe(0)
        }
    })

    it("compare disc counts from the evaluated side", () => {
        const board = new Board(8)
        board.play(3, 2)
        expect(coinParity(board, BLACK)).toBe(60)
        expect(coinParity(board, WHITE)).toBe(-60)
    })

    it("compare move counts of both sides", () => {
        const board = new Board(8)
        board.play(3, 2)
        expect(mobility(board, BLACK)).toBe(0)
        expect(allInOne(board, BLACK)).toBe(60)
    })

    it("truncate corner ratios toward zero", () => {
        const board = new Board(6, {
            black: (1n << 0n) | (1n << 35n),
            white: 1n << 5n,
            currentPlayer: BLACK,
        })
        expect(cornersCaptured(board, BLACK)).toBe(33)
        expect(cornersCaptured(board, WHITE)).toBe(-33)
    })

    it("stay within their ranges over a whole game", () => {
        const board = new Board(8)
        while (!board.isGameOver()) {
            for (const player of [BLACK, WHITE] as const) {
                for (const name of HEURISTIC_NAMES) {
                    if (name === "allInOne") continue
                    const v = HEURISTICS[name](board, player)
                    expect(v).toBeGreaterThanOrEqual(-100)
                    expect(v).toBeLessThanOrEqual(100)
                }
                expect(Math.abs(allInOne(board, player))).toBeLessThanOrEqual(1500)
            }
            const moves = board.legalMoveList()
            const pick = moves[moves.length - 1]
            board.play(pick.x, pick.y)
        }
    })
})
