#!/usr/bin/env node
import { runArgtest } from '../cli/argtest.js';

runArgtest();
