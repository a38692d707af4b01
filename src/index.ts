#!/usr/bin/env node
import { runDemo } from './scripts/demo';

runDemo();
