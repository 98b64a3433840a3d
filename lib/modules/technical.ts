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

import { readCode, readForeignWord } from '../utils/reading';
import { spellOut } from '../utils/spelling';
import { lookupUnit } from '../utils/units';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { MATH_FUNCTIONS } from './math';
import { BaseModule } from './base';

const HASHTAG = 'ھاشتاگ';
const AT = 'ئەت';
const DASH = 'داش';

const CURRENCY_CODES = new Set(['IQD', 'USD', 'EUR', 'GBP', 'JPY', 'AED', 'TRY', 'IRR', 'KWD', 'SAR', 'AUD', 'CAD']);

// letters and digits mixed, with optional underscores: "A1", "user_1"
const ALPHANUMERIC_RE = /^(?=.*[0-9])(?=.*[a-z])[a-z0-9_]+$/i;
// a number, a variable or a coefficient and a variable: "5", "x", "2x"
const TERM_RE = /^(?:[0-9]+|[0-9]*[a-z])$/i;

function isReserved(token : Token) : boolean {
    return Object.prototype.hasOwnProperty.call(MATH_FUNCTIONS, token.text.toLowerCase())
        || CURRENCY_CODES.has(token.text.toUpperCase())
        || lookupUnit(token.text) !== null;
}

/**
 * Read hashtags, mentions, MAC addresses and alphanumeric codes.
 *
 * Codes joined by tight hyphens ("550e8400-e29b") are read piece by piece
 * with the hyphen read "داش"; a hyphen between numbers and single-letter
 * variables is a range or a subtraction and is left to the math module.
 */
export default class TechnicalNormalizer extends BaseModule {
    readonly name = 'TechnicalNormalizer';
    readonly priority = 90;

    constructor(config : NormalizationConfig) {
        super(config, 'technical');
    }

    process(tokens : Token[]) : Token[] {
        for (const [start, end] of this._findCodeChains(tokens))
            this._mergeChain(tokens, start, end);

        const out : Token[] = [];
        for (const token of tokens) {
            if (token.isTombstone) {
                out.push(token);
            } else if (token.type === TokenType.TECHNICAL && /^[#@]/.test(token.text)) {
                out.push(...this._splitHandle(token));
            } else {
                if (token.type === TokenType.TECHNICAL
                    || (token.type === TokenType.WORD && !token.isConverted && ALPHANUMERIC_RE.test(token.text) && !isReserved(token)))
                    this._spell(token);
                out.push(token);
            }
        }
        return this._compact(out);
    }

    private _spell(token : Token) : void {
        token.convert(spellOut(token.text));
        token.tags.add(Tag.IS_SPELLED_OUT);
    }

    // "#Kurdistan" becomes two tokens, "ھاشتاگ" and the name
    private _splitHandle(token : Token) : Token[] {
        const core = token.text.substring(1);
        const marker = new Token(token.text.startsWith('#') ? HASHTAG : AT, TokenType.WORD, {
            originalText: token.text[0],
            whitespaceAfter: ' ',
            isConverted: true,
        });
        const name = new Token(/^[a-z]+$/i.test(core) ? readForeignWord(core) : readCode(core), TokenType.WORD, {
            originalText: core,
            tags: [Tag.IS_SPELLED_OUT],
            whitespaceAfter: token.whitespaceAfter,
            isConverted: true,
        });
        return [marker, name];
    }

    private _isCodePiece(token : Token) : boolean {
        if (token.isConverted || token.isTombstone)
            return false;
        if (token.type === TokenType.NUMBER)
            return /^[0-9a-z]+$/i.test(token.text);
        return token.type === TokenType.WORD && /^[a-z0-9_]+$/i.test(token.text) && !isReserved(token);
    }

    // the segments between the hyphens of a tight run of tokens
    private _segments(tokens : Token[], start : number, end : number) : string[] {
        const segments = [''];
        for (let i = start; i <= end; i++) {
            if (tokens[i].type === TokenType.SYMBOL)
                segments.push('');
            else
                segments[segments.length-1] += tokens[i].text;
        }
        return segments;
    }

    // a run is a code if one of its segments has a digit and it is not an
    // expression or a range: "GPT-4" and "e29b-41d4" but not "x-5", "2x-3" or "1990-2000"
    private _isCode(segments : string[]) : boolean {
        return segments.length > 1
            && segments.some((s) => /[0-9]/.test(s))
            && !segments.every((s) => TERM_RE.test(s));
    }

    // the [start, end] ranges of hyphen-joined code chains
    private _findCodeChains(tokens : Token[]) : Array<[number, number]> {
        const chains : Array<[number, number]> = [];
        let i = 0;
        while (i < tokens.length) {
            if (!this._isCodePiece(tokens[i])) {
                i++;
                continue;
            }
            let end = i;
            while (tokens[end].whitespaceAfter === '' && end + 1 < tokens.length) {
                const next = tokens[end+1];
                if (this._isCodePiece(next)) {
                    end += 1;
                } else if (next.type === TokenType.SYMBOL && next.text === '-' && next.whitespaceAfter === ''
                    && end + 2 < tokens.length && this._isCodePiece(tokens[end+2])) {
                    end += 2;
                } else {
                    break;
                }
            }
            if (this._isCode(this._segments(tokens, i, end)))
                chains.push([i, end]);
            i = end + 1;
        }
        return chains;
    }

    // read the chain on its first token, with the hyphens read "داش"
    private _mergeChain(tokens : Token[], start : number, end : number) : void {
        const first = tokens[start];
        const segments = this._segments(tokens, start, end);
        first.convert(segments.map(spellOut).join(` ${DASH} `));
        first.tags.add(Tag.IS_SPELLED_OUT);
        first.whitespaceAfter = tokens[end].whitespaceAfter;
        for (let i = start + 1; i <= end; i++) {
            tokens[i].consume();
            tokens[i].whitespaceAfter = '';
        }
    }
}
