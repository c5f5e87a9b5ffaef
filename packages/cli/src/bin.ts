#!/usr/bin/env -S node --import tsx
import { main } from './main.js'

process.exitCode = await main()
