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

import { integerToWords, intToKurdish } from '../utils/numbers';
import { GREEK_NAMES, LETTER_MAP } from '../utils/spelling';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { toAsciiDigits } from '../tokenizer/helpers';
import { NormalizationConfig } from '../config';
import { BaseModule, isNumeric } from './base';

export const MATH_SYMBOLS : Readonly<Record<string, string>> = {
    '+': 'کۆ',
    '*': 'کەڕەتی',
    '×': 'کەڕەتی',
    '/': 'دابەش',
    '÷': 'دابەش',
    '±': 'کەم کۆ',
    '√': 'ڕەگی دووجای',
    '-': 'کەم',
    '−': 'کەم',
    '=': 'یەکسانە بە',
    '^': 'توان',
    '%': 'لە سەدا',
    '≈': 'نزیکەی',
};

export const MATH_FUNCTIONS : Readonly<Record<string, string>> = {
    ln: 'لۆگاریتمی سروشتی',
    log: 'لۆگاریتمی',
    sin: 'ساینی',
    cos: 'کۆساینی',
    tan: 'تانجێنتی',
    lim: 'لیمێتی',
    mod: 'مۆد',
    exp: 'ئێکسپۆنێنشیاڵ',
};

// units that are never read as variables, even next to a number
export const STRICT_UNITS = new Set([
    'm', 'g', 'l', 's', 'h', 'kg', 'km', 'cm', 'mm', 'ml', 'mg',
    'gb', 'mb', 'kb', 'tb', 'ft', 'yd', 'mi', 'in', 'oz', 'lb',
    'v', 'w', 'j', 'pa', 'n', 'wh', 'kwh', 'kw', 'mw', 'hp',
    'mv', 'ma', 'kn', 'psi', 'kpa', 'cal', 'kcal', 'kj', 'gal', 'mph', 'ms'
]);

const BRACKETS : Readonly<Record<string, string>> = {
    '(': 'کەوانە',
    '[': 'کەوانە',
    ')': 'داخستنی کەوانە',
    ']': 'داخستنی کەوانە',
};
const OPENING = ['(', '['];

// after these a sign is unary
const UNARY_CONTEXT = ['(', '[', '{', '=', ','];

const FRACTION_GLYPHS : Readonly<Record<string, [number, number]>> = {
    '½': [1, 2], '¼': [1, 4], '¾': [3, 4],
    '⅓': [1, 3], '⅔': [2, 3],
    '⅕': [1, 5], '⅖': [2, 5], '⅗': [3, 5], '⅘': [4, 5],
    '⅙': [1, 6], '⅚': [5, 6],
    '⅛': [1, 8], '⅜': [3, 8], '⅝': [5, 8], '⅞': [7, 8],
    '⅐': [1, 7], '⅑': [1, 9], '⅒': [1, 10],
    '↉': [0, 3],
};

const SUBSCRIPT_DIGITS = '₀₁₂₃₄₅₆₇₈₉';
const SUPERSCRIPT_DIGITS = '⁰¹²³⁴⁵⁶⁷⁸⁹';

function has<T>(table : Readonly<Record<string, T>>, key : string) : boolean {
    return Object.prototype.hasOwnProperty.call(table, key);
}

export function scriptDigits(text : string, digits : string) : string|null {
    let out = '';
    for (const char of text) {
        const index = digits.indexOf(char);
        if (index < 0) {
            // ¹ ² ³ are outside the superscript block
            const latin1 = '¹²³'.indexOf(char);
            if (digits !== SUPERSCRIPT_DIGITS || latin1 < 0)
                return null;
            out += String(latin1 + 1);
        } else {
            out += String(index);
        }
    }
    return out || null;
}

/**
 * Read the fraction num/denom; a mixed fraction follows an integer and
 * starts with "و".
 */
export function formatFraction(num : number, denom : number, mixed : boolean) : string {
    if (num === 1 && denom === 2)
        return mixed ? 'و نیو' : 'نیوە';
    if (num === 1 && denom === 4)
        return mixed ? 'و چارەک' : 'چارەک';
    const words = `${intToKurdish(num)} لەسەر ${intToKurdish(denom)}`;
    return mixed ? 'و ' + words : words;
}

function isMathTerm(text : string) : boolean {
    return has(MATH_FUNCTIONS, text.toLowerCase()) || has(GREEK_NAMES, text);
}

function isUnit(token : Token|undefined) : boolean {
    return token !== undefined && (token.tags.has(Tag.IS_UNIT) || token.tags.has(Tag.UNIT_PROCESSED));
}

// a token that can be an operand
function isMathy(token : Token|undefined) : boolean {
    if (token === undefined)
        return false;
    if (token.type === TokenType.NUMBER || token.type === TokenType.SUBSCRIPT || token.type === TokenType.SUPERSCRIPT)
        return true;
    if (token.tags.has(Tag.MATH_TERM) || token.tags.has(Tag.MATH_FUNCTION) || token.tags.has(Tag.FRACTION))
        return true;
    if (isMathTerm(token.originalText))
        return true;
    return token.type === TokenType.WORD && /^[a-z]$/i.test(token.originalText);
}

// an operator, bracket or math term: its presence makes a "-" or a "/" part of an expression
function isActiveMath(token : Token|undefined) : boolean {
    if (token === undefined)
        return false;
    return has(MATH_SYMBOLS, token.originalText) || has(BRACKETS, token.originalText)
        || isMathTerm(token.originalText) || token.tags.has(Tag.MATH_TERM);
}

function isUnaryContext(token : Token|undefined) : boolean {
    return token === undefined || UNARY_CONTEXT.includes(token.originalText)
        || (token.type === TokenType.SYMBOL && has(MATH_SYMBOLS, token.originalText))
        || (token.isConverted && has(MATH_SYMBOLS, token.originalText));
}

function parseInteger(text : string) : number|null {
    const clean = toAsciiDigits(text).replace(/,/g, '');
    if (!/^[0-9]+$/.test(clean))
        return null;
    const value = parseInt(clean, 10);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Disambiguate mathematical notation.
 *
 * Operators are read as words only inside an expression, that is between
 * operands; "-" between two bare numbers is a range, and "/" between two
 * bare numbers is a fraction. Brackets are read only around an expression.
 */
export default class MathNormalizer extends BaseModule {
    readonly name = 'MathNormalizer';
    readonly priority = 80;

    constructor(config : NormalizationConfig) {
        super(config, 'math');
    }

    process(tokens : Token[]) : Token[] {
        // one entry per open bracket: whether it was read as part of an expression
        const brackets : boolean[] = [];

        for (let i = 0; i < tokens.length; i++) {
            const token = tokens[i];
            if (token.isTombstone || token.isConverted)
                continue;

            if (has(FRACTION_GLYPHS, token.text))
                this._processFractionGlyph(tokens, i);
            else if (token.type === TokenType.SUBSCRIPT || token.type === TokenType.SUPERSCRIPT)
                this._processScript(tokens, i);
            else if (token.type === TokenType.WORD)
                this._processWord(tokens, i);
            else if (token.type === TokenType.SYMBOL && has(BRACKETS, token.text))
                this._processBracket(tokens, i, brackets);
            else if (token.type === TokenType.SYMBOL && has(MATH_SYMBOLS, token.text))
                this._processOperator(tokens, i);
        }
        return this._compact(tokens);
    }

    private _processFractionGlyph(tokens : Token[], i : number) : void {
        const [num, denom] = FRACTION_GLYPHS[tokens[i].text];
        const prev = this._prev(tokens, i);
        const mixed = isNumeric(prev);
        tokens[i].convert(formatFraction(num, denom, mixed));
        tokens[i].tags.add(Tag.FRACTION);
        if (mixed)
            this._ensureSpaceAfter(prev);
    }

    private _processScript(tokens : Token[], i : number) : void {
        const token = tokens[i];
        const subscript = token.type === TokenType.SUBSCRIPT;
        // m² is handled by the unit module
        if (!subscript && isUnit(this._prev(tokens, i)))
            return;

        const digits = scriptDigits(token.text, subscript ? SUBSCRIPT_DIGITS : SUPERSCRIPT_DIGITS);
        if (digits === null)
            return;
        token.convert((subscript ? 'بنچینە ' : 'توان ') + integerToWords(digits));
        token.tags.add(Tag.MATH_TERM);
        this._ensureSpaceAfter(this._prev(tokens, i));
    }

    private _processWord(tokens : Token[], i : number) : void {
        const token = tokens[i];
        const prev = this._prev(tokens, i);
        const next = this._next(tokens, i);
        const lower = token.text.toLowerCase();

        if (has(MATH_FUNCTIONS, lower)) {
            // "log" is a function only when applied to something
            if (next !== undefined && (next.text === '(' || isMathy(next))) {
                token.convert(MATH_FUNCTIONS[lower]);
                token.tags.add(Tag.MATH_FUNCTION);
            }
            return;
        }
        if (has(GREEK_NAMES, token.text)) {
            token.convert(GREEK_NAMES[token.text]);
            token.tags.add(Tag.MATH_FUNCTION);
            return;
        }

        if (!/^[a-z]{1,2}$/i.test(token.text) || STRICT_UNITS.has(lower))
            return;
        if (!this._isVariableContext(token, prev, next))
            return;
        token.convert(Array.from(lower, (c) => LETTER_MAP[c]).join(' '));
        token.tags.add(Tag.MATH_TERM);
    }

    private _isVariableContext(token : Token, prev : Token|undefined, next : Token|undefined) : boolean {
        const isOperator = (t : Token|undefined) => t !== undefined
            && (has(MATH_SYMBOLS, t.originalText) || has(BRACKETS, t.originalText) || t.type === TokenType.SUPERSCRIPT);
        if (isOperator(prev) || isOperator(next))
            return true;
        // "2x" but not "5 is"
        return token.text.length === 1
            && (prev?.type === TokenType.NUMBER || next?.type === TokenType.NUMBER);
    }

    private _processBracket(tokens : Token[], i : number, open : boolean[]) : void {
        const token = tokens[i];
        if (OPENING.includes(token.text)) {
            const isExpression = this._opensExpression(tokens, i);
            open.push(isExpression);
            if (isExpression)
                token.convert(BRACKETS[token.text]);
            return;
        }
        if (open.pop() === true)
            token.convert(BRACKETS[token.text]);
    }

    private _opensExpression(tokens : Token[], i : number) : boolean {
        const next = this._next(tokens, i);
        if (next === undefined || !(isMathy(next) || OPENING.includes(next.text) || has(MATH_SYMBOLS, next.text)))
            return false;

        const prev = this._prev(tokens, i);
        if (prev !== undefined && (prev.tags.has(Tag.MATH_FUNCTION) || isActiveMath(prev)))
            return true;

        // otherwise there must be an operator before the bracket closes
        let depth = 0;
        for (let j = i + 1; j < tokens.length; j++) {
            const text = tokens[j].text;
            if (OPENING.includes(text)) {
                depth++;
            } else if (has(BRACKETS, text)) {
                if (depth === 0)
                    return false;
                depth--;
            } else if (tokens[j].type === TokenType.SYMBOL && has(MATH_SYMBOLS, text)) {
                return true;
            }
        }
        return false;
    }

    private _processOperator(tokens : Token[], i : number) : void {
        const token = tokens[i];
        const prevIndex = this._prevIndex(tokens, i);
        const nextIndex = this._nextIndex(tokens, i);
        const prev = prevIndex >= 0 ? tokens[prevIndex] : undefined;
        const next = nextIndex >= 0 ? tokens[nextIndex] : undefined;

        if (token.text === '+' && prev !== undefined && next !== undefined && prev.type === TokenType.WORD && !prev.tags.has(Tag.MATH_TERM)) {
            // "Kurd + Arab"
            if (next.type === TokenType.WORD && prev.text.length > 1) {
                token.convert('لەگەڵ');
                return;
            }
            if (next.type === TokenType.NUMBER)
                return;
        }

        // m^2 belongs to the unit module
        if (token.text === '^' && isUnit(prev))
            return;

        const prevValid = isUnaryContext(prev) || isMathy(prev) || prev?.originalText === ')' || prev?.originalText === ']';
        const nextValid = next !== undefined && (isMathy(next) || OPENING.includes(next.originalText)
            || this._isSignedOperand(tokens, nextIndex));
        if (!prevValid || !nextValid)
            return;

        const isolated = !isActiveMath(prevIndex >= 0 ? this._prev(tokens, prevIndex) : undefined)
            && !isActiveMath(nextIndex >= 0 ? this._next(tokens, nextIndex) : undefined);

        if (token.text === '-' || token.text === '−') {
            if (isNumeric(prev) && isNumeric(next) && isolated) {
                token.convert('بۆ');
                return;
            }
        }

        if ((token.text === '/' || token.text === '÷') && prev !== undefined && next !== undefined) {
            // km/h belongs to the unit module
            if (isUnit(prev) || isUnit(next))
                return;
            if (token.text === '/' && isolated && prev.type === TokenType.NUMBER && next.type === TokenType.NUMBER
                && this._mergeFraction(tokens, prevIndex, i, nextIndex))
                return;
        }

        if (isUnaryContext(prev) && ['-', '−', '+'].includes(token.text)) {
            // "-5" is merged into the number by the number module
            if (token.text !== '+' && next?.type === TokenType.NUMBER && !token.whitespaceAfter)
                return;
            token.convert(token.text === '+' ? 'موجەب' : 'سالب');
            return;
        }
        token.convert(MATH_SYMBOLS[token.text]);
    }

    // "= -5": a sign followed by an operand
    private _isSignedOperand(tokens : Token[], i : number) : boolean {
        const token = tokens[i];
        return token.type === TokenType.SYMBOL && ['-', '−', '+'].includes(token.originalText)
            && isMathy(this._next(tokens, i));
    }

    private _mergeFraction(tokens : Token[], numIndex : number, slashIndex : number, denomIndex : number) : boolean {
        const numerator = tokens[numIndex];
        const denominator = tokens[denomIndex];
        const num = parseInteger(numerator.text);
        const denom = parseInteger(denominator.text);
        if (num === null || denom === null || denom === 0) {
            this._logger.debug(`cannot read ${numerator.text}/${denominator.text} as a fraction`);
            return false;
        }

        const mixed = isNumeric(this._prev(tokens, numIndex));
        numerator.convert(formatFraction(num, denom, mixed));
        numerator.tags.add(Tag.FRACTION);
        numerator.whitespaceAfter = denominator.whitespaceAfter;
        tokens[slashIndex].consume();
        tokens[slashIndex].whitespaceAfter = '';
        denominator.consume();
        denominator.whitespaceAfter = '';
        return true;
    }
}
