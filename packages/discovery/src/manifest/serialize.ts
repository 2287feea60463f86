// 내부 모델(camelCase) → manifest JSON(snake_case)
// 선택 필드는 값이 없으면 키 자체를 생략 (null 사용 안 함)
import {
    PLUGIN_TYPE_WIRE,
    UPGRADE_TYPE_WIRE,
    type CallableDescriptor,
    type CallableJson,
    type ConfigJson,
    type JsonValue,
    type PackageManifest,
    type PackageManifestJson,
    type ParameterDescriptor,
    type ParameterJson,
    type PluginJson,
    type PluginRecord,
    type UpgradeStep,
    type UpgradeStepJson,
} from '@plugin-atlas/shared';
import type { ClassifiedValue } from '../parsers/value-classifier';

function toParameterJson(parameter: ParameterDescriptor): ParameterJson {
    return {
        ...(parameter.annotation !== undefined ? { annotation: parameter.annotation } : {}),
        ...(parameter.default !== undefined ? { default: parameter.default } : {}),
        required: parameter.required,
    };
}

function toParametersJson(parameters: Record<string, ParameterDescriptor>): Record<string, ParameterJson> {
    return Object.fromEntries(
        Object.entries(parameters).map(([name, parameter]) => [name, toParameterJson(parameter)]),
    );
}

export function toCallableJson(callable: CallableDescriptor): CallableJson {
    return {
        module: callable.module,
        name: callable.name,
        type: callable.type,
        return_annotation: callable.returnAnnotation ?? null,
        parameters: toParametersJson(callable.parameters),
    };
}

export function toConfigJson(config: CallableDescriptor): ConfigJson {
    return {
        module: config.module,
        name: config.name,
        return_annotation: config.returnAnnotation ?? null,
        parameters: toParametersJson(config.parameters),
    };
}

export function toUpgradeStepJson(step: UpgradeStep): UpgradeStepJson {
    return {
        name: step.name,
        func: toCallableJson(step.target),
        target_version: step.targetVersion,
        upgrade_type: UPGRADE_TYPE_WIRE[step.category],
        priority: step.priority,
        ...(step.minVersion !== undefined ? { min_version: step.minVersion } : {}),
        ...(step.maxVersion !== undefined ? { max_version: step.maxVersion } : {}),
    };
}

export function toPluginJson(plugin: PluginRecord): PluginJson {
    const json: PluginJson = {
        name: plugin.name,
        plugin_type: PLUGIN_TYPE_WIRE[plugin.kind],
        obj: toCallableJson(plugin.obj),
    };

    if (plugin.callMethod !== undefined) json.call_method = plugin.callMethod;
    if (plugin.description !== undefined) json.description = plugin.description;
    if (plugin.config) json.config = toConfigJson(plugin.config);
    if (plugin.ioType !== undefined) json.io_type = plugin.ioType;
    if (plugin.requiresStore !== undefined) json.requires_store = plugin.requiresStore;
    if (plugin.versionStrategy !== undefined) json.version_strategy = plugin.versionStrategy;
    if (plugin.versionReader !== undefined) json.version_reader = plugin.versionReader;
    if (plugin.upgradeSteps) json.upgrade_steps = plugin.upgradeSteps.map(toUpgradeStepJson);

    return json;
}

export function toManifestJson(manifest: PackageManifest): PackageManifestJson {
    return {
        name: manifest.name,
        plugins: manifest.plugins.map(toPluginJson),
        metadata: manifest.metadata,
    };
}

/** 분류된 값 → JSON 값 (버전 전략 같은 자유 형식 필드용) */
export function toJsonValue(value: ClassifiedValue): JsonValue {
    switch (value.kind) {
        case 'null':
            return null;
        case 'boolean':
        case 'string':
        case 'enum':
        case 'opaque':
            return value.value;
        case 'array':
            return [];
        case 'callable':
            return {
                module: value.callable.module,
                name: value.callable.name,
                type: value.callable.type,
                return_annotation: value.callable.returnAnnotation ?? null,
                parameters: {},
            };
        case 'decorated':
            return `${value.className}.${value.attribute}`;
    }
}
