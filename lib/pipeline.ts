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

import { getLogger } from 'log4js';

import { NormalizationConfig, makeConfig } from './config';
import Tokenizer from './tokenizer';
import { Token, compact } from './tokenizer/token';
import { Module } from './modules/base';

import WebNormalizer from './modules/web';
import PhoneNormalizer from './modules/phone';
import DateTimeNormalizer from './modules/date-time';
import TechnicalNormalizer from './modules/technical';
import UnitTagger from './modules/unit-tagger';
import CurrencyNormalizer from './modules/currency';
import MathNormalizer from './modules/math';
import UnitNormalizer from './modules/units';
import NumberNormalizer from './modules/number';
import SymbolNormalizer from './modules/symbols';
import EmojiNormalizer from './modules/emoji';
import DiacriticsNormalizer from './modules/diacritics';
import ScriptTagger from './modules/script-tagger';
import LinguisticsNormalizer from './modules/linguistics';
import TransliterationNormalizer from './modules/transliteration';
import GrammarNormalizer from './modules/grammar';
import SpacingNormalizer from './modules/spacing';

const logger = getLogger('ckb-normalizer.pipeline');

type ModuleClass = new (config : NormalizationConfig) => Module;

// modules in registration order, with the configuration flag that enables them
// (null if the module always runs)
const REGISTRY : Array<[ModuleClass, keyof NormalizationConfig|null]> = [
    [WebNormalizer, 'enableWeb'],
    [PhoneNormalizer, 'enablePhone'],
    [DateTimeNormalizer, 'enableDateTime'],
    [TechnicalNormalizer, 'enableTechnical'],
    [UnitTagger, 'enableUnits'],
    [CurrencyNormalizer, 'enableCurrency'],
    [MathNormalizer, 'enableMath'],
    [UnitNormalizer, 'enableUnits'],
    [NumberNormalizer, 'enableNumbers'],
    [SymbolNormalizer, 'enableSymbols'],
    [EmojiNormalizer, null],
    [DiacriticsNormalizer, 'enableDiacritics'],
    [ScriptTagger, 'enableLinguistics'],
    [LinguisticsNormalizer, 'enableLinguistics'],
    [TransliterationNormalizer, 'enableTransliteration'],
    [GrammarNormalizer, null],
    [SpacingNormalizer, null],
];

/**
 * Canonicalize the whitespace of the output: runs of spaces and tabs become
 * one space, runs of line breaks one newline, and the result is trimmed.
 */
export function cleanWhitespace(text : string) : string {
    return text.replace(/[ \t]+/g, ' ')
        .replace(/[\r\n]+/g, '\n')
        .replace(/ *\n */g, '\n')
        .trim();
}

/**
 * A configured sequence of normalization modules.
 *
 * A pipeline keeps no state between calls to {@link normalize}, and can be
 * reused for any number of texts.
 */
export default class Pipeline {
    readonly config : NormalizationConfig;
    private readonly _tokenizer : Tokenizer;
    private readonly _modules : Module[];

    constructor(config : Partial<NormalizationConfig> = {}) {
        this.config = makeConfig(config);
        this._tokenizer = new Tokenizer();

        const modules : Module[] = [];
        for (const [moduleClass, flag] of REGISTRY) {
            if (flag === null || this.config[flag] === true)
                modules.push(new moduleClass(this.config));
        }
        // Array.prototype.sort is stable, so ties keep registration order
        this._modules = modules.sort((a, b) => b.priority - a.priority);
    }

    get modules() : readonly Module[] {
        return this._modules;
    }

    /**
     * Add a custom pass, which runs in priority order with the built-in ones.
     */
    addModule(module : Module) : void {
        this._modules.push(module);
        this._modules.sort((a, b) => b.priority - a.priority);
    }

    private _runModule(module : Module, tokens : Token[]) : Token[] {
        const snapshot = tokens.map((token) => token.clone());
        try {
            return compact(module.process(tokens));
        } catch(e) {
            logger.warn(`Module ${module.name} failed, skipping: ${e instanceof Error ? e.message : String(e)}`);
            return snapshot;
        }
    }

    normalize(text : string) : string {
        if (!text.trim())
            return '';

        let tokens = this._tokenizer.tokenize(text);
        for (const module of this._modules)
            tokens = this._runModule(module, tokens);
        return cleanWhitespace(this._tokenizer.detokenize(tokens));
    }
}

/**
 * Normalize a single text with a fresh pipeline.
 */
export function normalize(text : string, config : Partial<NormalizationConfig> = {}) : string {
    return new Pipeline(config).normalize(text);
}
