// 등록 호출 원문 하나 → PluginRecord
// 예: ParserPlugin(name="reeds-parser", obj=ReEDSParser, config=ReEDSConfig, io_type=IOType.STDOUT)
import {
    InvalidSyntaxError,
    NotFoundError,
    PLUGIN_CONSTRUCTORS,
    silentLogger,
    type CallableDescriptor,
    type Logger,
    type PluginKind,
    type PluginRecord,
    type SymbolTable,
} from '@plugin-atlas/shared';
import { keywordMap, parseKeywordArguments } from '../parsers/kwargs';
import { classifyValue, type ClassifiedValue } from '../parsers/value-classifier';
import { toJsonValue } from './serialize';

export interface ParsedRegistration {
    record: PluginRecord;
    // upgrade_steps=ClassName.steps → 데코레이터 스캔으로 채울 클래스
    pendingStepsClass?: string;
}

const KNOWN_KEYWORDS = new Set([
    'name',
    'obj',
    'call_method',
    'description',
    'config',
    'io_type',
    'requires_store',
    'version_strategy',
    'version_reader',
    'upgrade_steps',
]);

/** 호출 텍스트의 생성자 이름 → PluginKind */
export function resolvePluginKind(callText: string): PluginKind {
    const open = callText.indexOf('(');
    const constructorName = (open === -1 ? callText : callText.slice(0, open)).replace(/\s+/g, '');
    const kind = PLUGIN_CONSTRUCTORS.get(constructorName);
    if (!kind) {
        throw new InvalidSyntaxError(`Unrecognized plugin constructor '${constructorName}'`);
    }
    return kind;
}

function textValue(value: ClassifiedValue | undefined): string | undefined {
    if (!value) return undefined;
    switch (value.kind) {
        case 'string':
        case 'enum':
        case 'opaque':
            return value.value;
        default:
            return undefined;
    }
}

/**
 * @throws InvalidSyntaxError 인자 텍스트가 깨졌거나 name이 문자열이 아님
 * @throws NotFoundError obj가 심볼 테이블의 callable로 해석되지 않음
 * @throws UnsupportedConstructError 값에 평가할 수 없는 속성 접근이 있음
 */
export function parseRegistration(
    callText: string,
    symbols: SymbolTable,
    logger: Logger = silentLogger,
): ParsedRegistration {
    const kind = resolvePluginKind(callText);
    const kwargs = keywordMap(parseKeywordArguments(callText));

    const values = new Map<string, ClassifiedValue>();
    for (const [key, raw] of kwargs) {
        if (!KNOWN_KEYWORDS.has(key)) {
            logger.debug(`Ignoring unknown keyword '${key}'`);
            continue;
        }
        values.set(key, classifyValue(raw, symbols));
    }

    const nameValue = values.get('name');
    if (nameValue?.kind !== 'string' || !nameValue.value) {
        throw new InvalidSyntaxError("Plugin missing 'name' field");
    }
    const name = nameValue.value;

    const objValue = values.get('obj');
    if (!objValue) throw new InvalidSyntaxError(`Plugin '${name}' missing 'obj' field`);
    if (objValue.kind !== 'callable') {
        throw new NotFoundError(`Plugin '${name}' obj '${kwargs.get('obj') ?? ''}' does not resolve to an imported symbol`);
    }

    const record: PluginRecord = { name, kind, obj: objValue.callable };
    let pendingStepsClass: string | undefined;

    const callMethod = textValue(values.get('call_method'));
    if (callMethod !== undefined) record.callMethod = callMethod;

    const description = textValue(values.get('description'));
    if (description !== undefined) record.description = description;

    const config = values.get('config');
    if (config?.kind === 'callable') {
        const descriptor: CallableDescriptor = { ...config.callable, type: 'class' };
        record.config = descriptor;
    } else if (config && config.kind !== 'null') {
        logger.debug(`Plugin '${name}' config '${kwargs.get('config') ?? ''}' is not an imported class`);
    }

    const ioType = textValue(values.get('io_type'));
    if (ioType !== undefined) record.ioType = ioType;

    const requiresStore = values.get('requires_store');
    if (requiresStore?.kind === 'boolean') record.requiresStore = requiresStore.value;

    const versionStrategy = values.get('version_strategy');
    if (versionStrategy && versionStrategy.kind !== 'null') record.versionStrategy = toJsonValue(versionStrategy);

    const versionReader = values.get('version_reader');
    if (versionReader && versionReader.kind !== 'null') record.versionReader = toJsonValue(versionReader);

    const upgradeSteps = values.get('upgrade_steps');
    if (upgradeSteps?.kind === 'decorated') {
        pendingStepsClass = upgradeSteps.className;
    } else if (upgradeSteps?.kind === 'array') {
        record.upgradeSteps = [];
    }

    return pendingStepsClass ? { record, pendingStepsClass } : { record };
}
