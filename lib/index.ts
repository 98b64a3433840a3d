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

import Pipeline, { normalize, cleanWhitespace } from './pipeline';
import Tokenizer from './tokenizer';
import { Token, TokenType, Tag, compact } from './tokenizer/token';
import type { TokenOptions } from './tokenizer/token';
import {
    ConfigurationError,
    DEFAULT_CONFIG,
    makeConfig
} from './config';
import type {
    NormalizationConfig,
    EmojiMode,
    DiacriticsMode,
    ShaddaMode
} from './config';
import { BaseModule } from './modules/base';
import type { Module } from './modules/base';

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

import * as NumberUtils from './utils/numbers';
import * as SuffixUtils from './utils/suffixes';

export {
    Pipeline,
    normalize,
    cleanWhitespace,

    Tokenizer,
    Token,
    TokenType,
    Tag,
    compact,

    ConfigurationError,
    DEFAULT_CONFIG,
    makeConfig,

    BaseModule,
    WebNormalizer,
    PhoneNormalizer,
    DateTimeNormalizer,
    TechnicalNormalizer,
    UnitTagger,
    CurrencyNormalizer,
    MathNormalizer,
    UnitNormalizer,
    NumberNormalizer,
    SymbolNormalizer,
    EmojiNormalizer,
    DiacriticsNormalizer,
    ScriptTagger,
    LinguisticsNormalizer,
    TransliterationNormalizer,
    GrammarNormalizer,
    SpacingNormalizer,

    NumberUtils,
    SuffixUtils,
};
export type {
    TokenOptions,
    NormalizationConfig,
    EmojiMode,
    DiacriticsMode,
    ShaddaMode,
    Module,
};
