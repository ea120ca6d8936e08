#!/usr/bin/env tsx
import { main } from './program';

void main();
