import { describe, expect, it } from 'vitest';
import {
    cardTagId,
    findCardReferences,
    findTemplateTagCards,
    rewriteCardReferences,
    rewriteCardTemplateTags
} from '../query/templateTags';

const lookup = (id: number) => new Map([[3, 30], [7, 70]]).get(id);

describe('SQL card tags', () => {
    it('finds each referenced card once, in order', () => {
        expect(findCardReferences('select * from {{#3}} join {{ #12-foo }} on true union {{#3-x}}')).toEqual([3, 12]);
        expect(findCardReferences('select {{created_at}} from orders')).toEqual([]);
    });

    it('rewrites mapped tags and keeps the rest', () => {
        const result = rewriteCardReferences('{{#3}} {{ #12-foo }} {{#3-x}}', lookup);
        expect(result.value).toBe('{{#30}} {{ #12-foo }} {{#30-x}}');
        expect(result.unresolved).toEqual([12]);
    });
});

describe('card template tags', () => {
    it('reads the card id from card-id or the key', () => {
        expect(cardTagId('#5-orders', { type: 'card', 'card-id': 9 })).toBe(9);
        expect(cardTagId('5-orders', { type: 'card' })).toBe(5);
        expect(cardTagId('5-orders', { type: 'text' })).toBeNull();
        expect(findTemplateTagCards({ '#7': { type: 'card', 'card-id': 7 }, created: { type: 'date' } })).toEqual([7]);
    });

    it('renames tags without a # prefix', () => {
        const result = rewriteCardTemplateTags({
            '7-orders': { type: 'card', 'card-id': 7, name: '7-orders', 'display-name': 'Orders' },
        }, lookup);

        expect(result.value).toEqual({
            '70-orders': { type: 'card', 'card-id': 70, name: '70-orders', 'display-name': 'Orders' },
        });
        expect(result.unresolved).toEqual([]);
    });

    it('leaves unmapped tags and other tag types untouched', () => {
        const tags = {
            '#8-misc': { type: 'card', 'card-id': 8, name: '#8-misc' },
            region: { type: 'text', name: 'region' },
        };
        const result = rewriteCardTemplateTags(tags, lookup);

        expect(result.value).toEqual(tags);
        expect(result.unresolved).toEqual([8]);
    });
});
