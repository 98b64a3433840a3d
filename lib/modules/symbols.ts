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

import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule, isNumeric } from './base';

const PERCENT = 'لە سەدا';
const PERCENT_SIGNS = ['%', '٪'];

const WORDS : Readonly<Record<string, string>> = {
    '&': 'و',
    '°': 'پلە',
};

// punctuation that is kept, but said once
const SENTENCE_PUNCTUATION = new Set(['.', ',', '،', ';', '؛', ':', '!', '?', '؟']);

// quotes, brackets and decorations, which are not read
const DROPPED = new Set([
    '"', '“', '”', '„', '«', '»', '‹', '›', "'", '‘', '’', '`',
    '(', ')', '[', ']', '{', '}', '<', '>',
    '*', '#', '~', '|', '^', '_', '\\', '•', '·', '§', '¶', '†', '‡', '©', '®', '™',
]);

/**
 * Read or drop the symbols that no other module handled.
 */
export default class SymbolNormalizer extends BaseModule {
    readonly name = 'SymbolNormalizer';
    readonly priority = 50;

    constructor(config : NormalizationConfig) {
        super(config, 'symbols');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.type !== TokenType.SYMBOL || token.isConverted || token.isTombstone || token.tags.has(Tag.EMOJI))
                return;

            if (PERCENT_SIGNS.includes(token.text)) {
                this._processPercent(tokens, i);
            } else if (Object.prototype.hasOwnProperty.call(WORDS, token.text)) {
                token.convert(WORDS[token.text]);
            } else if (SENTENCE_PUNCTUATION.has(token.text)) {
                // "!!!" and "..." are said once
                const prev = this._prev(tokens, i);
                if (prev !== undefined && prev.text === token.text && prev.whitespaceAfter === '') {
                    prev.whitespaceAfter = token.whitespaceAfter;
                    token.consume();
                    token.whitespaceAfter = '';
                }
            } else if (token.text === '-' && this._isCompoundHyphen(tokens, i)) {
                // "شار-گوند" is read as two words
                const prev = this._prev(tokens, i);
                if (prev !== undefined)
                    prev.whitespaceAfter = ' ';
                token.consume();
                token.whitespaceAfter = '';
            } else if (DROPPED.has(token.text)) {
                token.consume();
            }
        });
        return this._compact(tokens);
    }

    // a hyphen written tight between two words
    private _isCompoundHyphen(tokens : Token[], i : number) : boolean {
        const prev = this._prev(tokens, i);
        const next = this._next(tokens, i);
        return prev !== undefined && next !== undefined
            && prev.whitespaceAfter === '' && tokens[i].whitespaceAfter === ''
            && prev.type === TokenType.WORD && next.type === TokenType.WORD
            && !isNumeric(prev) && !isNumeric(next);
    }

    // "50%" and "%50" are both read "لە سەدا پەنجا"
    private _processPercent(tokens : Token[], i : number) : void {
        const token = tokens[i];
        const prev = this._prev(tokens, i);
        const next = this._next(tokens, i);
        if (prev !== undefined && isNumeric(prev)) {
            prev.convert(PERCENT + ' ' + prev.text);
            prev.whitespaceAfter = token.whitespaceAfter;
            token.consume();
            token.whitespaceAfter = '';
        } else if (next !== undefined && isNumeric(next)) {
            next.convert(PERCENT + ' ' + next.text);
            token.consume();
        } else {
            token.convert(PERCENT);
        }
    }
}
