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

// FILE: src/lib/bitboard.ts

import { BitboardSizeMismatchError, IndexOutOfBoundsError } from "./errors"

export type Move = { x: number; y: number }

export type Direction = "N" | "S" | "E" | "W" | "NE" | "NW" | "SE" | "SW"

export const DIRECTIONS: ReadonlyArray<Direction> = ["N", "S", "E", "W", "NE", "NW", "SE", "SW"] as const

type Masks = { full: bigint; west: bigint; east: bigint }

const maskCache = new Map<number, Masks>()

// west excludes column 0, east excludes column size - 1
function masksFor(size: number): Masks {
    const cached = maskCache.get(size)
    if (cached) return cached

    let full = 0n
    let west = 0n
    let east = 0n
    for (let i = 0; i < size * size; i++) {
        const bit = 1n << BigInt(i)
        full |= bit
        if (i % size !== 0) west |= bit
        if (i % size !== size - 1) east |= bit
    }

    const masks = { full, west, east }
    maskCache.set(size, masks)
    return masks
}

function popcount32(n: number): number {
    n = n - ((n >>> 1) & 0x55555555)
    n = (n & 0x33333333) + ((n >>> 2) & 0x33333333)
    n = (n + (n >>> 4)) & 0x0f0f0f0f
    return Math.imul(n, 0x01010101) >>> 24
}

export const columnLetter = (x: number) => String.fromCharCode(97 + x)

/**
 * A square grid of cells packed into one bigint, bit index `y * size + x`.
 *
 * Boolean operators and shifts return new bitboards; `set` mutates in place.
 */
export class Bitboard {
    readonly size: number
    readonly fullMask: bigint
    readonly westMask: bigint
    readonly eastMask: bigint
    private value: bigint

    constructor(size: number, bits = 0n) {
        if (!Number.isInteger(size) || size <= 0) {
            throw new RangeError(`Bitboard size must be a positive integer, got ${size}`)
        }
        const masks = masksFor(size)
        this.size = size
        this.fullMask = masks.full
        this.westMask = masks.west
        this.eastMask = masks.east
        this.value = bits & masks.full
    }

    get bits(): bigint {
        return this.value
    }

    set bits(next: bigint) {
        this.value = next & this.fullMask
    }

    private index(x: number, y: number): bigint {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.size || y >= this.size) {
            throw new IndexOutOfBoundsError(x, y, this.size)
        }
        return BigInt(y * this.size + x)
    }

    get(x: number, y: number): boolean {
        return (this.value & (1n << this.index(x, y))) !== 0n
    }

    set(x: number, y: number, value: boolean): void {
        const bit = 1n << this.index(x, y)
        this.value = value ? this.value | bit : this.value & (this.fullMask ^ bit)
    }

    shift(direction: Direction): Bitboard {
        const n = BigInt(this.size)
        const b = this.value
        switch (direction) {
            case "N":
                return new Bitboard(this.size, b >> n)
            case "S":
                return new Bitboard(this.size, b << n)
            case "E":
                return new Bitboard(this.size, (b << 1n) & this.westMask)
            case "W":
                return new Bitboard(this.size, (b >> 1n) & this.eastMask)
            case "NE":
                return new Bitboard(this.size, (b >> (n - 1n)) & this.westMask)
            case "NW":
                return new Bitboard(this.size, (b >> (n + 1n)) & this.eastMask)
            case "SE":
                return new Bitboard(this.size, (b << (n + 1n)) & this.westMask)
            case "SW":
                return new Bitboard(this.size, (b << (n - 1n)) & this.eastMask)
        }
    }

    private checkSize(other: Bitboard) {
        if (other.size !== this.size) throw new BitboardSizeMismatchError(this.size, other.size)
    }

    and(other: Bitboard): Bitboard {
        this.checkSize(other)
        return new Bitboard(this.size, this.value & other.value)
    }

    or(other: Bitboard): Bitboard {
        this.checkSize(other)
        return new Bitboard(this.size, this.value | other.value)
    }

    xor(other: Bitboard): Bitboard {
        this.checkSize(other)
        return new Bitboard(this.size, this.value ^ other.value)
    }

    andNot(other: Bitboard): Bitboard {
        this.checkSize(other)
        return new Bitboard(this.size, this.value & (this.fullMask ^ other.value))
    }

    isEmpty(): boolean {
        return this.value === 0n
    }

    popcount(): number {
        let count = 0
        let rest = this.value
        while (rest !== 0n) {
            count += popcount32(Number(BigInt.asUintN(32, rest)))
            rest >>= 32n
        }
        return count
    }

    /** Coordinates of every set bit, in ascending bit index. */
    hotBits(): Move[] {
        const out: Move[] = []
        let rest = this.value
        let i = 0
        while (rest !== 0n) {
            if (rest & 1n) out.push({ x: i % this.size, y: Math.floor(i / this.size) })
            rest >>= 1n
            i++
        }
        return out
    }

    equals(other: Bitboard): boolean {
        return other.size === this.size && other.value === this.value
    }

    clone(): Bitboard {
        return new Bitboard(this.size, this.value)
    }

    toString(): string {
        const header = "   " + Array.from({ length: this.size }, (_, x) => columnLetter(x)).join(" ")
        const rows: string[] = []
        for (let y = 0; y < this.size; y++) {
            const cells: string[] = []
            for (let x = 0; x < this.size; x++) cells.push(this.get(x, y) ? "X" : "_")
            rows.push(`${String(y + 1).padStart(2)} ${cells.join(" ")}`)
        }
        return [header, ...rows].join("\n")
    }
}
