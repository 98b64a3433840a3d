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

import Lexer from 'flex-js';

import { WS, makeToken } from './helpers';
import { Tag, Token, TokenType } from './token';

// whitespace is returned by the lexer as a plain string, and attached
// to the preceding token
type Lexeme = Token|string;

// This interface exists so that we don't depend on Lexer in the public
// interface, so the generated .d.ts will not try to load flex-js
interface LexerLike<T> {
    text : string;

    addRule(expr : RegExp, cb ?: (self : LexerLike<T>) => T) : void;
}

// disable eslint warning about combining characters
/*eslint no-misleading-character-class: off */

const TLDS = ['com', 'net', 'org', 'edu', 'gov', 'mil', 'info', 'biz', 'app', 'dev', 'io', 'me', 'co', 'uk', 'us',
    'eu', 'de', 'fr', 'it', 'ca', 'tr', 'iq', 'ir', 'krd', 'tv', 'ai'];

/**
 * Lexical analyzer splitting mixed Kurdish, Arabic and Latin text into tokens.
 *
 * This is a classic longest-match-first lexer: when two rules match a string
 * of the same length, the rule added first wins. Rigid patterns (URLs, emails,
 * phone numbers, dates, times) are added before generic numbers, words and
 * symbols, so they take priority on ties.
 *
 * The tokenizer never fails: anything not matched by a specific rule is
 * returned as a single-character SYMBOL.
 */
export default class Tokenizer {
    private _realLexer : Lexer<Lexeme>;
    protected _lexer : LexerLike<Lexeme>;

    constructor() {
        this._realLexer = new Lexer();
        this._lexer = this._realLexer;

        this._realLexer.setIgnoreCase(true);

        this._initBase();
        this._initEmojis();
        this._initURLs();
        this._initEmailAddress();
        // init phone numbers and dates before numbers so they take priority if they match the same string
        this._initPhoneNumber();
        this._initDates();
        this._initTimes();
        this._initMacAddress();
        this._initNumbers();
        this._initUsernameHashtags();
        this._initScripts();

        this._initCatchAll();
    }

    protected _addDefinition(name : string, expansion : RegExp) {
        // HACK: the "addDefinition" function of Lexer does not recursively expand definitions, so we need to do that ourselves
        let source = expansion.source;
        for (const name in this._realLexer.definitions) {
            const replace = new RegExp('{' + name + '}', 'ig');
            source = source.replace(replace, '(?:' + this._realLexer.definitions[name] + ')');
        }
        this._realLexer.addDefinition(name, new RegExp(source));
    }

    protected _initBase() {
        this._addDefinition('WS', WS);
        this._lexer.addRule(WS, (lexer) => lexer.text);

        this._addDefinition('DIGIT', /[0-9\u0660-\u0669\u06f0-\u06f9]/);

        // letters: Latin (with accents), Greek, Cyrillic, the Arabic script (including
        // harakat, tatweel and Quranic marks, but not Arabic digits and punctuation), CJK,
        // and the zero-width (non-)joiners used inside Kurdish words
        this._addDefinition('LETTER', /[a-z\u00c0-\u00d6\u00d8-\u00f6\u00f8-\u024f\u0300-\u036f\u0370-\u03ff\u0400-\u04ff\u1e00-\u1eff\u0620-\u065f\u066e-\u06d3\u06d5-\u06ed\u06fa-\u06ff\u0750-\u077f\u08a0-\u08ff\ufb50-\ufdff\ufe70-\ufefc\u200c\u200d\u4e00-\u9fff]/);

        // words
        // digits are part of a word if preceded by a letter (A1, GPT4)
        // underscores are part of a word if in-between two letters or digits (user_1)
        // hyphens are always a token by themselves: "x-5" is a subtraction, and
        // hyphenated codes (GPT-4, e89b-12d3) are put back together by the technical module
        this._addDefinition('WORD', /{LETTER}(?:{LETTER}|{DIGIT}|_(?={LETTER}|{DIGIT}))*/);

        // identifiers, used for host names
        this._addDefinition('IDENT', /[a-z0-9](?:[a-z0-9_-]*[a-z0-9])?/);
    }

    protected _initEmojis() {
        // non-BMP characters in the emoji planes
        // note: these are not Unicode regular expressions, they are UTF-16 regular expressions
        this._addDefinition('NONBMP', /[\ud83c-\ud83e][\udc00-\udfff]/);
        // miscellaneous technical, symbols and dingbats, arrows
        this._addDefinition('BMP_EMOJI', /[\u2300-\u23ff\u2600-\u27bf\u2b00-\u2bff]/);
        // base character, followed by variation selector and skin tone modifier
        this._addDefinition('EMOJI1', /{NONBMP}\ufe0f?(?:\ud83c[\udffb-\udfff])?|{BMP_EMOJI}\ufe0f?/);
        this._addDefinition('EMOJI2', /{EMOJI1}(?:\u200d{EMOJI1})*/);

        // keep flags together...
        this._addDefinition('EMOJI_FLAG', /(?:\ud83c[\udde6-\uddff]){2}/);

        this._lexer.addRule(/{EMOJI_FLAG}|{EMOJI2}/, (lexer) => makeToken(lexer.text, TokenType.SYMBOL, [Tag.EMOJI]));
    }

    protected _initURLs() {
        // a long url is http:// and similar, followed by anything up to ">", "," or whitespace
        // (hence, parenthesis, quotes, etc. are part of the URL), except for trailing sentence punctuation
        this._addDefinition('URL_CHAR', /[^ \t\n\r\v\f\u00a0\u180e\u2000-\u200b\u2028\u2029\u202f\u205f\u3000\ufeff,>"]/);
        this._lexer.addRule(/(?:https?|ftps?|sftp|file):\/\/{URL_CHAR}*[^ \t\n\r\v\f\u00a0\u2000-\u200b\u3000,>".!?;:)]/,
            (lexer) => makeToken(lexer.text, TokenType.URL));

        // a short url is www. followed by one or more . idents, or a one or more idents followed by a common TLD,
        // with an optional path
        this._addDefinition('TLD', new RegExp('(?:' + TLDS.join('|') + ')(?!{LETTER})'));
        this._lexer.addRule(/(?:www\.{IDENT}(?:\.{IDENT})+|{IDENT}(?:\.{IDENT})*?\.{TLD})(?:\/{URL_CHAR}*[^ \t\n\r\v\f,>".!?;:)])?/,
            (lexer) => makeToken(lexer.text, TokenType.URL));
    }

    protected _initEmailAddress() {
        this._addDefinition('DOMAIN_PART', /(?:{LETTER}|{DIGIT})(?:{LETTER}|{DIGIT}|-)*/);
        this._lexer.addRule(/(?:mailto:)?(?:{LETTER}|{DIGIT}|[.+_-])+@{DOMAIN_PART}(?:\.{DOMAIN_PART})+/,
            (lexer) => makeToken(lexer.text, TokenType.EMAIL));
    }

    protected _initPhoneNumber() {
        // international numbers, either compact or grouped with spaces or dashes
        this._addDefinition('INTL_PHONE_NUMBER', /\+{DIGIT}{7,15}|\+{DIGIT}{1,4}(?:[ -]{DIGIT}{2,4}){2,5}/);
        // Kurdistan/Iraq mobile numbers: 07xx xxx xx xx
        this._addDefinition('LOCAL_PHONE_NUMBER', /[0\u0660\u06f0][7\u0667\u06f7]{DIGIT}{9}|[0\u0660\u06f0][7\u0667\u06f7]{DIGIT}{2}[ -]{DIGIT}{3}[ -]{DIGIT}{2}[ -]{DIGIT}{2}/);

        this._lexer.addRule(/(?:{INTL_PHONE_NUMBER}|{LOCAL_PHONE_NUMBER})(?!{DIGIT})/,
            (lexer) => makeToken(lexer.text, TokenType.PHONE));
    }

    protected _initDates() {
        // numeric dates with a four digit year, at the beginning (year-month-day)
        // or at the end (day-month-year or month-day-year)
        this._addDefinition('DATE_SEP', /[/.-]/);
        this._lexer.addRule(/(?:{DIGIT}{4}{DATE_SEP}{DIGIT}{1,2}{DATE_SEP}{DIGIT}{1,2}|{DIGIT}{1,2}{DATE_SEP}{DIGIT}{1,2}{DATE_SEP}{DIGIT}{4})(?!{DIGIT})/,
            (lexer) => makeToken(lexer.text, TokenType.DATE));
    }

    protected _initTimes() {
        // hours:minutes, with optional seconds and an optional am/pm marker attached
        // the hour is not range-checked: durations such as 44:00 are normalized
        // by the date/time module
        this._lexer.addRule(/{DIGIT}{1,3}:{DIGIT}{2}(?::{DIGIT}{2})?(?!{DIGIT})(?:[ap]\.?m\.?(?!{LETTER}))?/,
            (lexer) => makeToken(lexer.text, TokenType.TIME));
    }

    protected _initMacAddress() {
        this._lexer.addRule(/(?:[0-9a-f]{2}:){5}[0-9a-f]{2}(?![0-9a-z])/,
            (lexer) => makeToken(lexer.text, TokenType.TECHNICAL));
    }

    protected _initNumbers() {
        // numbers with thousands separators, plain or decimal numbers, and scientific notation
        // the sign is never part of the number: a leading minus is merged by the number module
        this._addDefinition('GROUPED_NUMBER', /{DIGIT}{1,3}(?:[,\u066c]{DIGIT}{3})+(?:[.\u066b]{DIGIT}+)?/);
        this._addDefinition('DECIMAL_NUMBER', /{DIGIT}+(?:[.\u066b]{DIGIT}+)?(?:e[+-]?{DIGIT}+)?/);

        this._lexer.addRule(/{GROUPED_NUMBER}|{DECIMAL_NUMBER}/,
            (lexer) => makeToken(lexer.text, TokenType.NUMBER));
    }

    protected _initUsernameHashtags() {
        this._lexer.addRule(/[#@]{WORD}/, (lexer) => makeToken(lexer.text, TokenType.TECHNICAL));
    }

    protected _initScripts() {
        this._lexer.addRule(/[\u2070\u00b9\u00b2\u00b3\u2074-\u2079]+/,
            (lexer) => makeToken(lexer.text, TokenType.SUPERSCRIPT));
        this._lexer.addRule(/[\u2080-\u2089]+/,
            (lexer) => makeToken(lexer.text, TokenType.SUBSCRIPT));
    }

    protected _initCatchAll() {
        // temperature units stay together, so they can be tagged as units
        this._lexer.addRule(/°[cf](?!{LETTER})/, (lexer) => makeToken(lexer.text, TokenType.SYMBOL));

        // the simplest rule: matching words
        // this must be last so we match special words first
        this._lexer.addRule(/{WORD}/, (lexer) => makeToken(lexer.text, TokenType.WORD));

        // catch-all rule: punctuation and other symbols
        this._lexer.addRule(/./, (lexer) => makeToken(lexer.text, TokenType.SYMBOL));
    }

    /**
     * Split the text into tokens.
     *
     * Whitespace is preserved verbatim in the `whitespaceAfter` property of the
     * preceding token. Leading whitespace has no preceding token and is dropped.
     */
    tokenize(text : string) : Token[] {
        this._realLexer.setSource(text);

        const tokens : Token[] = [];
        let lexeme : Lexeme|(typeof Lexer.EOF);
        while ((lexeme = this._realLexer.lex()) !== Lexer.EOF) {
            if (typeof lexeme === 'string') {
                if (tokens.length > 0)
                    tokens[tokens.length-1].whitespaceAfter += lexeme;
                continue;
            }
            tokens.push(lexeme);
        }
        return tokens;
    }

    /**
     * Reassemble the text from the tokens.
     *
     * This is the exact inverse of {@link tokenize} on an unmodified token list.
     */
    detokenize(tokens : Token[]) : string {
        return tokens.map((token) => token.text + token.whitespaceAfter).join('');
    }
}
