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

// FILE: src/lib/errors.ts

export class IndexOutOfBoundsError extends Error {
    constructor(
        readonly x: number,
        readonly y: number,
        readonly size: number
    ) {
        super(`Cell ${x}:${y} is outside a ${size}x${size} board`)
        this.name = "IndexOutOfBoundsError"
    }
}

export class BitboardSizeMismatchError extends Error {
    constructor(left: number, right: number) {
        super(`Cannot combine bitboards of size ${left} and ${right}`)
        this.name = "BitboardSizeMismatchError"
    }
}

export class IllegalBoardSizeError extends Error {
    constructor(readonly value: unknown) {
        super(`Illegal board size: ${String(value)}`)
        this.name = "IllegalBoardSizeError"
    }
}

export class IllegalMoveError extends Error {
    constructor(
        readonly x: number,
        readonly y: number,
        readonly player: "black" | "white"
    ) {
        super(`Move ${x}:${y} from player ${player} is illegal`)
        this.name = "IllegalMoveError"
    }
}

export class GameOverError extends Error {
    constructor() {
        super("The board is in game over")
        this.name = "GameOverError"
    }
}

export class CannotUndoError extends Error {
    constructor() {
        super("Cannot pop from a board without history")
        this.name = "CannotUndoError"
    }
}

/** Raised by the save parser; `line` is 1-based. */
export class ParseError extends Error {
    constructor(
        readonly reason: string,
        readonly line: number
    ) {
        super(`${reason} at line ${line}`)
        this.name = "ParseError"
    }
}

export class SearchError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "SearchError"
    }
}
