// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.
//
// Author: Giovanni Campagna <gcampagn@cs.stanford.edu>

export enum TokenType {
    WORD = 'WORD',
    NUMBER = 'NUMBER',
    SYMBOL = 'SYMBOL',
    URL = 'URL',
    EMAIL = 'EMAIL',
    PHONE = 'PHONE',
    DATE = 'DATE',
    TIME = 'TIME',
    TECHNICAL = 'TECHNICAL',
    SUBSCRIPT = 'SUBSCRIPT',
    SUPERSCRIPT = 'SUPERSCRIPT',
    UNKNOWN = 'UNKNOWN'
}

/**
 * Semantic labels attached to tokens by the taggers and modules, and
 * consumed by the modules that run after them.
 */
export enum Tag {
    IS_UNIT = 'IS_UNIT',
    UNIT_PROCESSED = 'UNIT_PROCESSED',
    MATH_TERM = 'MATH_TERM',
    MATH_FUNCTION = 'MATH_FUNCTION',
    FRACTION = 'FRACTION',
    CURRENCY = 'CURRENCY',
    DATE = 'DATE',
    TIME = 'TIME',
    EMOJI = 'EMOJI',
    IS_SPELLED_OUT = 'IS_SPELLED_OUT',
    SCRIPT_LATIN = 'SCRIPT_LATIN',
    SCRIPT_KURDISH = 'SCRIPT_KURDISH',
    SCRIPT_ARABIC = 'SCRIPT_ARABIC',
    SCRIPT_CYRILLIC = 'SCRIPT_CYRILLIC',
    SCRIPT_GREEK = 'SCRIPT_GREEK',
    SCRIPT_OTHER = 'SCRIPT_OTHER'
}

export interface TokenOptions {
    originalText ?: string;
    tags ?: Iterable<Tag>;
    whitespaceAfter ?: string;
    isConverted ?: boolean;
}

/**
 * The unit of work passed between the tokenizer and every module.
 *
 * Modules mutate tokens in place. A token whose text is set to the empty
 * string is a tombstone: it was consumed by a neighbor and will be dropped
 * at the next compaction.
 */
export class Token {
    text : string;
    readonly originalText : string;
    type : TokenType;
    tags : Set<Tag>;
    whitespaceAfter : string;
    isConverted : boolean;

    constructor(text : string, type : TokenType, options : TokenOptions = {}) {
        this.text = text;
        this.originalText = options.originalText ?? text;
        this.type = type;
        this.tags = new Set(options.tags ?? []);
        this.whitespaceAfter = options.whitespaceAfter ?? '';
        this.isConverted = options.isConverted ?? false;
    }

    get isTombstone() : boolean {
        return this.text === '';
    }

    /**
     * Replace the text of this token with its spoken form.
     */
    convert(text : string, type : TokenType = TokenType.WORD) : void {
        this.text = text;
        this.type = type;
        this.isConverted = true;
    }

    /**
     * Mark this token as consumed by a neighbor.
     */
    consume() : void {
        this.text = '';
        this.type = TokenType.UNKNOWN;
    }

    clone() : Token {
        return new Token(this.text, this.type, {
            originalText: this.originalText,
            tags: this.tags,
            whitespaceAfter: this.whitespaceAfter,
            isConverted: this.isConverted
        });
    }

    toString() : string {
        return this.text + this.whitespaceAfter;
    }
}

/**
 * Drop tombstoned tokens.
 *
 * The trailing whitespace of a dropped token moves to the previous surviving
 * token, if that token has none of its own.
 */
export function compact(tokens : Token[]) : Token[] {
    const out : Token[] = [];
    for (const token of tokens) {
        if (!token.isTombstone) {
            out.push(token);
            continue;
        }
        const prev = out[out.length-1];
        if (prev && !prev.whitespaceAfter && token.whitespaceAfter)
            prev.whitespaceAfter = token.whitespaceAfter;
    }
    return out;
}
