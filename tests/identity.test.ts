import { describe, expect, it } from 'vitest';

import { extractIdentity } from '../code/identity.js';

describe('extractIdentity', () => {
    it('reads the name and student id from page text', () => {
        const text = [
            'UNOFFICIAL ACADEMIC TRANSCRIPT',
            'Westbrook State University',
            'Name: Test Student 001',
            'Student ID: 99990001',
        ].join('\n');
        expect(extractIdentity([{ text }])).toEqual({ name: 'Test Student 001', id: '99990001' });
    });

    it('keeps the first match and never overwrites it', () => {
        const pages = [
            { text: 'Name: First Person\nStudent ID: 111' },
            { text: 'Name: Second Person\nStudent ID: 222' },
        ];
        expect(extractIdentity(pages)).toEqual({ name: 'First Person', id: '111' });
    });

    it('collects the fields across pages', () => {
        const pages = [
            { text: 'Some header\nName: Jane Q. Public' },
            { text: 'Student ID: 0042\nName: Someone Else' },
        ];
        expect(extractIdentity(pages)).toEqual({ name: 'Jane Q. Public', id: '0042' });
    });

    it('tolerates leading whitespace on a line', () => {
        expect(extractIdentity([{ text: '   Name:  Pat Doe  \r\n  Student ID: 123' }])).toEqual({ name: 'Pat Doe', id: '123' });
    });

    it('leaves missing fields undefined', () => {
        expect(extractIdentity([{ text: 'Name: Only A Name\nStudent ID: none' }])).toEqual({ name: 'Only A Name' });
        expect(extractIdentity([])).toEqual({});
    });
});
