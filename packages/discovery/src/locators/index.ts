import type Parser from 'web-tree-sitter';
import { silentLogger, type LocatorStrategy, type Logger } from '@plugin-atlas/shared';
import { TextualCallLocator } from './textual';
import { TreeQueryCallLocator } from './tree-query';
import { defaultLocatorOptions, type CallLocator, type CallLocatorOptions } from './types';

export { TextualCallLocator, extractFunctionBody, findConstructorCalls } from './textual';
export { TreeQueryCallLocator } from './tree-query';
export { defaultLocatorOptions, noRegistrationsFound } from './types';
export type { CallLocator, CallLocatorOptions } from './types';

/**
 * 전략에 맞는 locator 선택
 * - auto: 파서가 로드되어 있으면 tree, 아니면 text
 * - tree: 파서가 없으면 경고 후 text로 대체
 */
export function selectCallLocator(
    strategy: LocatorStrategy,
    parser: Parser | null,
    options: CallLocatorOptions = defaultLocatorOptions,
    logger: Logger = silentLogger,
): CallLocator {
    if (strategy === 'text') return new TextualCallLocator(options);
    if (parser) return new TreeQueryCallLocator(parser, options);
    if (strategy === 'tree') {
        logger.warn('Python grammar not loaded, falling back to textual call locator');
    }
    return new TextualCallLocator(options);
}
