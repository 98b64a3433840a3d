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

import { toAsciiDigits } from '../tokenizer/helpers';

const DIGITS = ['سفر', 'یەک', 'دوو', 'سێ', 'چوار', 'پێنج', 'شەش', 'حەوت', 'ھەشت', 'نۆ'];
const TEENS = ['دە', 'یازدە', 'دوازدە', 'سێزدە', 'چواردە', 'پازدە', 'شازدە', 'حەڤدە', 'ھەژدە', 'نۆزدە'];
const TENS = ['', '', 'بیست', 'سی', 'چل', 'پەنجا', 'شەست', 'حەفتا', 'ھەشتا', 'نەوەد'];
const HUNDRED = 'سەد';

// powers of 1000
const SCALES = ['', 'ھەزار', 'ملیۆن', 'ملیار', 'ترلیۆن', 'کوادرلیۆن', 'کوینتلیۆن', 'سێکستلیۆن', 'سێپتلیۆن'];

export const AND = ' و ';
export const POINT = 'پۆینت';
export const HALF = 'نیو';
export const NEGATIVE = 'سالب';
export const TIMES_TEN_TO_THE = 'کەڕەتی دە بە توانی';

// numbers whose magnitude is outside these bounds are read in scientific notation
export const MAX_PLAIN_DIGITS = 21;
export const MIN_PLAIN_FRACTION_ZEROS = 20;

function belowThousand(n : number) : string[] {
    const parts : string[] = [];
    const hundreds = Math.floor(n / 100);
    const rest = n % 100;
    if (hundreds === 1)
        parts.push(HUNDRED);
    else if (hundreds > 1)
        parts.push(DIGITS[hundreds] + ' ' + HUNDRED);

    if (rest >= 20) {
        parts.push(TENS[Math.floor(rest / 10)]);
        if (rest % 10 !== 0)
            parts.push(DIGITS[rest % 10]);
    } else if (rest >= 10) {
        parts.push(TEENS[rest - 10]);
    } else if (rest > 0) {
        parts.push(DIGITS[rest]);
    }
    return parts;
}

/**
 * Read a non-negative integer, given as a string of ASCII digits, in words.
 *
 * The number is split in groups of three digits from the right, each group is
 * read on its own followed by its scale word, and all the parts are joined by
 * "و". A thousand on its own is read "ھەزار", not "یەک ھەزار".
 */
export function integerToWords(digits : string) : string {
    const stripped = digits.replace(/^0+/, '');
    if (stripped === '')
        return DIGITS[0];

    const groups : number[] = [];
    for (let end = stripped.length; end > 0; end -= 3)
        groups.unshift(parseInt(stripped.substring(Math.max(0, end - 3), end), 10));
    if (groups.length > SCALES.length)
        return digitsToWords(stripped);

    const parts : string[] = [];
    groups.forEach((group, i) => {
        if (group === 0)
            return;
        const scale = groups.length - 1 - i;
        if (scale === 0)
            parts.push(...belowThousand(group));
        else if (scale === 1 && group === 1)
            parts.push(SCALES[1]);
        else
            parts.push(belowThousand(group).join(AND) + ' ' + SCALES[scale]);
    });
    return parts.join(AND);
}

export function intToKurdish(value : number) : string {
    if (!Number.isSafeInteger(value))
        throw new RangeError(`Cannot read ${value} as an integer`);
    if (value < 0)
        return NEGATIVE + ' ' + integerToWords(String(-value));
    return integerToWords(String(value));
}

/**
 * Read every digit individually.
 */
export function digitsToWords(digits : string) : string {
    return Array.from(digits, (d) => DIGITS[parseInt(d, 10)]).join(' ');
}

/**
 * Read a group of digits such as the parts of a phone number: leading zeros
 * are read one by one, the rest as a single number.
 */
export function digitGroupToWords(digits : string) : string {
    const rest = digits.replace(/^0+/, '');
    if (rest === '')
        return digitsToWords(digits);
    const zeros = digits.substring(0, digits.length - rest.length);
    const words = zeros.length > 0 ? [digitsToWords(zeros)] : [];
    words.push(integerToWords(rest));
    return words.join(' ');
}

function fractionToWords(fraction : string) : string {
    const trimmed = fraction.replace(/0+$/, '');
    if (trimmed === '')
        return DIGITS[0];
    return digitGroupToWords(trimmed);
}

function decimalToWords(integer : string, fraction : string|undefined) : string {
    if (fraction === undefined)
        return integerToWords(integer);
    if (fraction === '5') {
        if (/^0*$/.test(integer))
            return HALF;
        return integerToWords(integer) + AND + HALF;
    }
    return integerToWords(integer) + ' ' + POINT + ' ' + fractionToWords(fraction);
}

/**
 * Read a number in scientific notation, with the mantissa given as a decimal string.
 */
export function scientificToWords(mantissa : string, exponent : number) : string {
    const dot = mantissa.indexOf('.');
    const mantissaWords = dot < 0 ? decimalToWords(mantissa, undefined)
        : decimalToWords(mantissa.substring(0, dot), mantissa.substring(dot + 1));
    return `${mantissaWords} ${TIMES_TEN_TO_THE} ${intToKurdish(exponent)}`;
}

function toScientific(integer : string, fraction : string) : [string, number]|null {
    const significant = integer.replace(/^0+/, '');
    if (significant.length > MAX_PLAIN_DIGITS) {
        const rest = significant.substring(1).replace(/0+$/, '');
        return [rest ? significant[0] + '.' + rest : significant[0], significant.length - 1];
    }
    if (significant === '' && fraction) {
        const zeros = fraction.length - fraction.replace(/^0+/, '').length;
        const digits = fraction.substring(zeros).replace(/0+$/, '');
        if (digits && zeros >= MIN_PLAIN_FRACTION_ZEROS) {
            const rest = digits.substring(1);
            return [rest ? digits[0] + '.' + rest : digits[0], -(zeros + 1)];
        }
    }
    return null;
}

/**
 * Read the digit string of a NUMBER token in words.
 *
 * This accepts Arabic-Indic digits, thousands separators, decimals and
 * scientific notation, but not signs. Returns null if the text is not
 * a number.
 */
export function numberToWords(text : string) : string|null {
    const normalized = toAsciiDigits(text).replace(/,/g, '');
    const match = /^([0-9]+)(?:\.([0-9]+))?(?:e([+-]?[0-9]+))?$/i.exec(normalized);
    if (match === null)
        return null;
    const integer = match[1];
    const fraction : string|undefined = match[2];
    const exponent : string|undefined = match[3];

    if (exponent !== undefined) {
        const exponentValue = parseInt(exponent, 10);
        if (!Number.isSafeInteger(exponentValue))
            return null;
        return scientificToWords(fraction !== undefined ? integer + '.' + fraction : integer, exponentValue);
    }

    const scientific = toScientific(integer, fraction ?? '');
    if (scientific !== null)
        return scientificToWords(scientific[0], scientific[1]);

    // identifiers and codes: 0025 is not twenty-five
    if (fraction === undefined && integer.length > 1 && integer.startsWith('0'))
        return digitsToWords(integer);

    return decimalToWords(integer, fraction);
}
