import { describe, expect, it } from 'vitest'
import { isToolKind, summarizeToolCall } from '../../../src/stream/tool-summary.js'

describe('summarizeToolCall', () => {
    it.each([
        ['Bash', { command: 'npm test' }, 'Bash: npm test'],
        ['Read', { file_path: '/repo/a.ts' }, 'Read: /repo/a.ts'],
        ['Edit', { file_path: '/repo/b.ts' }, 'Edit: /repo/b.ts'],
        ['Write', { file_path: '/repo/c.ts' }, 'Write: /repo/c.ts'],
        ['Grep', { pattern: 'TODO', path: 'src' }, 'Grep: TODO in src'],
        ['Glob', { pattern: '**/*.ts' }, 'Glob: **/*.ts'],
        ['Task', { description: 'write tests' }, 'Task: write tests'],
    ])('formats %s calls', (name, input, expected) => {
        expect(summarizeToolCall(name, input)).toBe(expected)
    })

    it('defaults the Grep path to the current directory', () => {
        expect(summarizeToolCall('Grep', { pattern: 'foo' })).toBe('Grep: foo in .')
    })

    it('cuts Bash commands at 120 characters', () => {
        const command = 'a'.repeat(300)
        expect(summarizeToolCall('Bash', { command })).toBe(`Bash: ${'a'.repeat(120)}`)
    })

    it('ignores arguments of the wrong type', () => {
        expect(summarizeToolCall('Read', { file_path: 42 })).toBe('Read: ')
    })

    it('falls back to the bare name for unknown tools', () => {
        expect(summarizeToolCall('WebFetch', { url: 'https://example.test' })).toBe('WebFetch')
    })

    it('does not treat inherited object keys as tools', () => {
        expect(isToolKind('toString')).toBe(false)
        expect(summarizeToolCall('toString', {})).toBe('toString')
    })
})
