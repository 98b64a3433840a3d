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

import { digitGroupToWords } from './numbers';
import { toAsciiDigits } from '../tokenizer/helpers';

/**
 * The names of the Latin letters, as read in Kurdish.
 */
export const LETTER_MAP : Readonly<Record<string, string>> = {
    a: 'ئەی', b: 'بی', c: 'سی', d: 'دی', e: 'ئی', f: 'ئێف', g: 'جی',
    h: 'ئێچ', i: 'ئای', j: 'جەی', k: 'کەی', l: 'ئێڵ', m: 'ئێم', n: 'ئێن',
    o: 'ئۆ', p: 'پی', q: 'کیو', r: 'ئاڕ', s: 'ئێس', t: 'تی', u: 'یو',
    v: 'ڤی', w: 'دەبڵیو', x: 'ئێکس', y: 'وای', z: 'زێد',
};

export const GREEK_NAMES : Readonly<Record<string, string>> = {
    'α': 'ئەلفا', 'β': 'بێتا', 'γ': 'گاما', 'δ': 'دێڵتا', 'Δ': 'دێڵتا',
    'ε': 'ئێپسیلۆن', 'θ': 'سیتا', 'λ': 'لامبدا', 'μ': 'میو', 'π': 'پای',
    'ρ': 'ڕۆ', 'σ': 'سیگما', 'Σ': 'سیگما', 'τ': 'تاو', 'φ': 'فای',
    'ω': 'ئۆمێگا', 'Ω': 'ئۆمێگا',
};

/**
 * The names of the symbols that occur inside addresses, handles and codes.
 */
export const SYMBOL_NAMES : Readonly<Record<string, string>> = {
    '.': 'دۆت',
    '@': 'ئەت',
    '/': 'سلاش',
    '\\': 'باکسلاش',
    ':': 'کۆڵۆن',
    '-': 'داش',
    '_': 'ئەندەرسکۆڕ',
    '#': 'ھاشتاگ',
    '+': 'پلەس',
    '=': 'یەکسان',
    '&': 'ئەند',
    '?': 'پرسیار',
    '%': 'لە سەدا',
    '~': 'تیلد',
};

function lookup(table : Readonly<Record<string, string>>, key : string) : string|undefined {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function letterName(char : string) : string|undefined {
    return lookup(LETTER_MAP, char.toLowerCase()) ?? lookup(GREEK_NAMES, char);
}

export function symbolName(char : string) : string|undefined {
    return lookup(SYMBOL_NAMES, char);
}

/**
 * Read a code character by character: Latin and Greek letters by their
 * names, runs of digits as numbers, known symbols by their names.
 *
 * Runs of Kurdish or Arabic letters are kept as they are; other characters
 * are dropped.
 */
export function spellOut(text : string) : string {
    const words : string[] = [];
    const re = /([0-9]+)|([\u0600-\u06ff]+)|(.)/gu;
    let match : RegExpExecArray|null;
    const source = toAsciiDigits(text);
    while ((match = re.exec(source)) !== null) {
        if (match[1] !== undefined) {
            words.push(digitGroupToWords(match[1]));
        } else if (match[2] !== undefined) {
            words.push(match[2]);
        } else {
            const name = letterName(match[3]) ?? symbolName(match[3]);
            if (name !== undefined)
                words.push(name);
        }
    }
    return words.join(' ');
}
