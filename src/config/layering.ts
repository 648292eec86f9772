/**
 * 分层清单加载器
 *
 * 分层清单按优先级从低到高列出包名，用来取代目录枚举顺序决定的覆盖关系：
 *
 * ```json
 * { "version": 1, "layers": ["ApplicationSuite", "ContosoExtensions"] }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { Ajv, type ErrorObject, type JSONSchemaType } from 'ajv';
import { DiagnosticBuilder, DiagnosticCode, dummyPosition, type Diagnostic } from '../diagnostics/diagnostics.js';

interface LayerManifestDocument {
  version: number;
  layers: string[];
}

const layerManifestSchema: JSONSchemaType<LayerManifestDocument> = {
  type: 'object',
  properties: {
    version: { type: 'integer', minimum: 1, maximum: 1 },
    layers: {
      type: 'array',
      items: { type: 'string', minLength: 1, pattern: '^[^/\\\\]+$' },
      uniqueItems: true,
    },
  },
  required: ['version', 'layers'],
  additionalProperties: false,
};

const ajv = new Ajv({ strict: true, allErrors: true });
const validateLayerManifest = ajv.compile(layerManifestSchema);

/**
 * 读取并校验分层清单
 *
 * @param filePath 清单文件路径
 * @returns 按优先级升序排列的包名，或诊断错误数组
 */
export async function loadLayerManifest(filePath: string): Promise<readonly string[] | Diagnostic[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return [
        DiagnosticBuilder.error(DiagnosticCode.LBL102_LayerManifestNotFound)
          .withMessage(`找不到分层清单文件：${filePath}`)
          .withPosition(dummyPosition())
          .build(),
      ];
    }
    return [
      DiagnosticBuilder.error(DiagnosticCode.LBL101_LayerManifestInvalid)
        .withMessage(`读取分层清单失败：${error.message}`)
        .withPosition(dummyPosition())
        .build(),
    ];
  }

  return parseLayerManifest(content);
}

/**
 * 解析分层清单内容
 *
 * @param content JSON 文本
 * @returns 包名列表，或诊断错误数组
 */
export function parseLayerManifest(content: string): readonly string[] | Diagnostic[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [
      DiagnosticBuilder.error(DiagnosticCode.LBL101_LayerManifestInvalid)
        .withMessage(`分层清单 JSON 解析失败：${message}`)
        .withPosition(dummyPosition())
        .build(),
    ];
  }

  if (!validateLayerManifest(document)) {
    const errors = validateLayerManifest.errors ?? [];
    return errors.map(mapAjvErrorToDiagnostic);
  }

  return Object.freeze([...document.layers]);
}

function mapAjvErrorToDiagnostic(error: ErrorObject): Diagnostic {
  const fieldPath = error.instancePath || '/';
  return DiagnosticBuilder.error(DiagnosticCode.LBL101_LayerManifestInvalid)
    .withMessage(`分层清单字段 ${fieldPath} 无效：${error.message ?? error.keyword}`)
    .withPosition(dummyPosition())
    .build();
}
