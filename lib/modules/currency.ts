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

import { integerToWords, numberToWords } from '../utils/numbers';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { toAsciiDigits } from '../tokenizer/helpers';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

export interface Currency {
    name : string;
    subunit ?: string;
}

const DOLLAR : Currency = { name: 'دۆلار', subunit: 'سەنت' };
const EURO : Currency = { name: 'یۆرۆ', subunit: 'سەنت' };
const POUND : Currency = { name: 'پاوەند', subunit: 'پێنس' };
const YEN : Currency = { name: 'یەن' };
const DINAR : Currency = { name: 'دینار', subunit: 'فلس' };
const LIRA : Currency = { name: 'لیرە' };

const CURRENCIES : ReadonlyMap<string, Currency> = new Map([
    ['$', DOLLAR], ['USD', DOLLAR],
    ['€', EURO], ['EUR', EURO],
    ['£', POUND], ['GBP', POUND],
    ['¥', YEN], ['JPY', YEN],
    ['IQD', DINAR], ['د.ع', DINAR],
    ['₺', LIRA], ['TRY', LIRA],
    ['AED', { name: 'دەرھەم', subunit: 'فلس' }],
    ['IRR', { name: 'ڕیاڵ' }],
    ['KWD', { name: 'دیناری کوەیتی', subunit: 'فلس' }],
    ['SAR', { name: 'ڕیاڵی سعوودی', subunit: 'ھەڵەڵە' }],
    ['AUD', { name: 'دۆلاری ئوسترالی', subunit: 'سەنت' }],
    ['CAD', { name: 'دۆلاری کەنەدی', subunit: 'سەنت' }],
]);

// "د.ع" is lexed as three tokens
const DINAR_ABBREVIATION = ['د', '.', 'ع'];

interface CurrencyMatch {
    currency : Currency;
    // indices of the tokens that make up the currency
    indices : number[];
}

/**
 * Read an amount of money.
 *
 * Decimals are read in the subunit ("12.50 $" is twelve dollars and fifty
 * cents) when the currency has one.
 */
export function readAmount(amount : string, currency : Currency) : string|null {
    const clean = toAsciiDigits(amount).replace(/,/g, '');
    const match = /^([0-9]+)(?:\.([0-9]+))?$/.exec(clean);
    if (match === null)
        return null;

    const integer = match[1];
    const fraction : string|undefined = match[2];
    if (fraction === undefined)
        return `${integerToWords(integer)} ${currency.name}`;
    if (currency.subunit === undefined) {
        const words = numberToWords(clean);
        return words === null ? null : `${words} ${currency.name}`;
    }

    const cents = parseInt((fraction + '0').substring(0, 2), 10);
    if (cents === 0)
        return `${integerToWords(integer)} ${currency.name}`;
    if (/^0*$/.test(integer))
        return `${integerToWords(String(cents))} ${currency.subunit}`;
    return `${integerToWords(integer)} ${currency.name} و ${integerToWords(String(cents))} ${currency.subunit}`;
}

/**
 * Merge amounts of money and their currency symbol or code, written before
 * or after the number, into a single token.
 */
export default class CurrencyNormalizer extends BaseModule {
    readonly name = 'CurrencyNormalizer';
    readonly priority = 85;

    constructor(config : NormalizationConfig) {
        super(config, 'currency');
    }

    process(tokens : Token[]) : Token[] {
        for (let i = 0; i < tokens.length; i++) {
            const token = tokens[i];
            if (token.type !== TokenType.NUMBER || token.isTombstone)
                continue;

            const after = this._matchAfter(tokens, i);
            const before = after === null ? this._matchBefore(tokens, i) : null;
            const match = after ?? before;
            if (match === null)
                continue;

            const words = readAmount(token.text, match.currency);
            if (words === null) {
                this._logger.debug(`cannot read ${token.text} as an amount`);
                continue;
            }
            if (after !== null)
                token.whitespaceAfter = tokens[after.indices[after.indices.length-1]].whitespaceAfter;
            for (const j of match.indices) {
                tokens[j].consume();
                tokens[j].whitespaceAfter = '';
            }
            token.convert(words);
            token.tags.add(Tag.CURRENCY);
        }

        // a symbol on its own
        for (const token of tokens) {
            if (token.type !== TokenType.SYMBOL)
                continue;
            const currency = CURRENCIES.get(token.text);
            if (currency !== undefined) {
                token.convert(currency.name);
                token.tags.add(Tag.CURRENCY);
            }
        }
        return this._compact(tokens);
    }

    private _currencyAt(tokens : Token[], i : number) : CurrencyMatch|null {
        const token = tokens[i];
        if (token.isConverted)
            return null;
        const currency = CURRENCIES.get(token.text);
        if (currency !== undefined)
            return { currency, indices: [i] };

        if (token.text === DINAR_ABBREVIATION[0] && i + 2 < tokens.length
            && tokens[i+1].text === DINAR_ABBREVIATION[1] && tokens[i+2].text === DINAR_ABBREVIATION[2]
            && !token.whitespaceAfter && !tokens[i+1].whitespaceAfter)
            return { currency: DINAR, indices: [i, i+1, i+2] };
        return null;
    }

    private _matchAfter(tokens : Token[], i : number) : CurrencyMatch|null {
        const next = this._nextIndex(tokens, i);
        return next < 0 ? null : this._currencyAt(tokens, next);
    }

    private _matchBefore(tokens : Token[], i : number) : CurrencyMatch|null {
        const prev = this._prevIndex(tokens, i);
        if (prev < 0)
            return null;
        // "د.ع" is only written after the amount
        const match = this._currencyAt(tokens, prev);
        return match !== null && match.indices.length === 1 ? match : null;
    }
}
