#!/usr/bin/env -S node --import tsx

import { runNodeJs } from '@bufbuild/protoplugin';
import { createCacheManagerPlugin } from './protoc-plugin.js';

runNodeJs(createCacheManagerPlugin());
