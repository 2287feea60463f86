// tree-sitter(Python grammar) 기반 Call Locator
// function_definition(name=<function>) → 첫 plugins=[...] 리스트 노드 → 생성자 call 노드
import type Parser from 'web-tree-sitter';
import {
    defaultLocatorOptions,
    dropNestedRanges,
    noRegistrationsFound,
    type CallLocator,
    type CallLocatorOptions,
} from './types';

// SyntaxNode 순회 (BFS)
function* walkNodes(root: Parser.SyntaxNode): Generator<Parser.SyntaxNode> {
    const queue: Parser.SyntaxNode[] = [root];
    for (let i = 0; i < queue.length; i++) {
        const node = queue[i];
        if (!node) continue;
        yield node;
        queue.push(...node.children);
    }
}

// 조건에 맞는 노드 중 소스상 가장 앞에 있는 것
function firstInSource(
    root: Parser.SyntaxNode,
    predicate: (node: Parser.SyntaxNode) => boolean,
): Parser.SyntaxNode | null {
    let first: Parser.SyntaxNode | null = null;
    for (const node of walkNodes(root)) {
        if (!predicate(node)) continue;
        if (!first || node.startIndex < first.startIndex) first = node;
    }
    return first;
}

// plugins=[...] (키워드 인자) 또는 plugins = [...] (대입)의 리스트 노드
function listValueOf(node: Parser.SyntaxNode, listKeyword: string): Parser.SyntaxNode | null {
    if (node.type === 'keyword_argument') {
        const name = node.childForFieldName('name');
        const value = node.childForFieldName('value');
        if (name?.text === listKeyword && value?.type === 'list') return value;
    }
    if (node.type === 'assignment' && !node.childForFieldName('type')) {
        const left = node.childForFieldName('left');
        const right = node.childForFieldName('right');
        if (left?.type === 'identifier' && left.text === listKeyword && right?.type === 'list') return right;
    }
    return null;
}

export class TreeQueryCallLocator implements CallLocator {
    readonly strategy = 'tree' as const;

    constructor(
        private readonly parser: Parser,
        private readonly options: CallLocatorOptions = defaultLocatorOptions,
    ) {}

    locate(source: string): string[] {
        const { functionName, listKeyword, constructors } = this.options;
        const tree = this.parser.parse(source);

        try {
            const fn = firstInSource(
                tree.rootNode,
                (node) => node.type === 'function_definition' && node.childForFieldName('name')?.text === functionName,
            );
            const body = fn?.childForFieldName('body');
            if (!body) throw noRegistrationsFound(functionName);

            const holder = firstInSource(body, (node) => listValueOf(node, listKeyword) !== null);
            const list = holder ? listValueOf(holder, listKeyword) : null;
            if (!list) throw noRegistrationsFound(functionName);

            const ranges: Array<{ start: number; end: number; text: string }> = [];
            for (const node of walkNodes(list)) {
                if (node.type !== 'call') continue;
                const callee = node.childForFieldName('function');
                if (!callee || !constructors.has(callee.text)) continue;
                ranges.push({ start: node.startIndex, end: node.endIndex, text: node.text });
            }

            const calls = dropNestedRanges(ranges).map((range) => range.text);
            if (calls.length === 0) throw noRegistrationsFound(functionName);
            return calls;
        } finally {
            tree.delete();
        }
    }
}
