import fs from 'node:fs'
import { fileURLToPath } from 'node:url'

import { splitLines } from '../../src/FieldFile.js'

export const fixturePath = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))

export const readFixtureText = (name: string): string => fs.readFileSync(fixturePath(name), 'utf8')

export const readFixtureLines = (name: string): ReadonlyArray<string> => splitLines(readFixtureText(name))
