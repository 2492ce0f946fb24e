import { afterEach, expect } from 'vitest';
import { getDefaultState } from '@covermark/core';

import { createMarkMatchers } from './matchers.js';
import { createQuiescenceCheck } from './quiescence.js';
import './index.js';

expect.extend(createMarkMatchers(getDefaultState));

// A scope left open by one test must never leak into the next one
afterEach(createQuiescenceCheck(getDefaultState));
