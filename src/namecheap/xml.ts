/**
 * ApiResponse envelope handling shared by every command decoder.
 *
 * Values are read as raw text (no coercion, no trimming) so that amounts like
 * "6.00" and offsets like "+5:30" reach the decoders verbatim.
 */

import { XMLParser } from 'fast-xml-parser';
import { MalformedResponseError, NamecheapApiError } from './errors';
import type { ApiError, ResponseMetadata } from './types';

export const NAMESPACE = 'http://api.namecheap.com/xml.response';
export const ATTRIBUTE_PREFIX = '@_';

const TEXT_NODE = '#text';

// Repeated elements that must decode as lists even when only one is present
const LIST_PATHS = new Set([
  'ApiResponse.Errors.Error',
  'ApiResponse.CommandResponse.UserGetPricingResult.ProductType',
  'ApiResponse.CommandResponse.UserGetPricingResult.ProductType.ProductCategory',
  'ApiResponse.CommandResponse.UserGetPricingResult.ProductType.ProductCategory.Product',
  'ApiResponse.CommandResponse.UserGetPricingResult.ProductType.ProductCategory.Product.Price',
  'ApiResponse.CommandResponse.DomainCheckResult',
]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  isArray: (_tagName, jPath, _isLeafNode, isAttribute) => !isAttribute && LIST_PATHS.has(jPath),
});

/**
 * Parsed element: attributes under "@_Name", children under their tag name
 */
export type XmlNode = { readonly [key: string]: unknown };

export interface Envelope {
  command: XmlNode;
  metadata: ResponseMetadata;
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return typeof value === 'string' && value.trim() === '';
}

/**
 * Empty elements such as <Errors /> come back from the parser as "",
 * and elements holding only indentation as that whitespace
 */
function toElement(value: unknown, path: string): XmlNode {
  if (isBlank(value)) {
    return {};
  }
  if (isNode(value)) {
    return value;
  }
  throw new MalformedResponseError('expected an element', path);
}

export function childElement(parent: XmlNode, name: string, path: string): XmlNode {
  const childPath = `${path}/${name}`;
  const value = parent[name];
  if (value === undefined) {
    throw new MalformedResponseError('missing required element', childPath);
  }
  return toElement(value, childPath);
}

/**
 * All children with the given tag, in document order (empty when there are none)
 */
export function childElements(parent: XmlNode, name: string, path: string): XmlNode[] {
  const value = parent[name];
  if (value === undefined) {
    return [];
  }
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item, index) => toElement(item, `${path}/${name}[${index}]`));
}

export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isNode(value)) {
    const text = value[TEXT_NODE];
    return typeof text === 'string' ? text : '';
  }
  return undefined;
}

export function childText(parent: XmlNode, name: string, path: string): string {
  const text = textOf(parent[name]);
  if (text === undefined) {
    throw new MalformedResponseError('missing required element', `${path}/${name}`);
  }
  return text;
}

export function optionalAttr(node: XmlNode, name: string): string | undefined {
  const value = node[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

export function requiredAttr(node: XmlNode, name: string, path: string): string {
  const value = optionalAttr(node, name);
  if (value === undefined) {
    throw new MalformedResponseError('missing required attribute', `${path}/@${name}`);
  }
  return value;
}

const DECIMAL = /^\d+(?:\.\d+)?$/;
const INTEGER = /^\d+$/;

export function decimalAttr(node: XmlNode, name: string, path: string): string {
  const value = requiredAttr(node, name, path);
  if (!DECIMAL.test(value)) {
    throw new MalformedResponseError(`"${value}" is not a decimal amount`, `${path}/@${name}`);
  }
  return value;
}

/**
 * Decimal attribute where an empty value means "not set"
 */
export function optionalDecimalAttr(node: XmlNode, name: string, path: string): string | undefined {
  const value = optionalAttr(node, name);
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!DECIMAL.test(value)) {
    throw new MalformedResponseError(`"${value}" is not a decimal amount`, `${path}/@${name}`);
  }
  return value;
}

export function positiveIntegerAttr(node: XmlNode, name: string, path: string): number {
  const value = requiredAttr(node, name, path);
  const parsed = INTEGER.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new MalformedResponseError(`"${value}" is not a positive integer`, `${path}/@${name}`);
  }
  return parsed;
}

export function booleanAttr(node: XmlNode, name: string, path: string): boolean | undefined {
  const value = optionalAttr(node, name);
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new MalformedResponseError(`"${value}" is not a boolean`, `${path}/@${name}`);
}

function parseDocument(document: string): XmlNode {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(document, true);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedResponseError(`not well-formed XML (${reason})`, '/');
  }
  if (!isNode(parsed)) {
    throw new MalformedResponseError('document has no root element', '/');
  }
  return parsed;
}

function readErrors(root: XmlNode, path: string): ApiError[] {
  if (root.Errors === undefined) {
    return [];
  }
  const errorsPath = `${path}/Errors`;
  const errors = childElement(root, 'Errors', path);

  return childElements(errors, 'Error', errorsPath).map((node, index) => {
    const errorPath = `${errorsPath}/Error[${index}]`;
    const number = requiredAttr(node, 'Number', errorPath);
    if (!INTEGER.test(number)) {
      throw new MalformedResponseError(`"${number}" is not an error number`, `${errorPath}/@Number`);
    }
    return { code: Number(number), message: textOf(node) ?? '' };
  });
}

function readMetadata(root: XmlNode, path: string): ResponseMetadata {
  const executionTime = childText(root, 'ExecutionTime', path);
  if (!DECIMAL.test(executionTime.trim())) {
    throw new MalformedResponseError(`"${executionTime}" is not a number of seconds`, `${path}/ExecutionTime`);
  }
  const executionTimeSeconds = Number(executionTime.trim());

  return {
    server: childText(root, 'Server', path),
    gmtTimeDifference: childText(root, 'GMTTimeDifference', path),
    executionTimeSeconds,
  };
}

/**
 * Validate the ApiResponse envelope and return its CommandResponse.
 *
 * @throws NamecheapApiError when Status="ERROR"
 * @throws MalformedResponseError when the envelope does not have the documented shape
 */
export function readEnvelope(document: string): Envelope {
  const parsed = parseDocument(document);
  const path = '/ApiResponse';

  if (parsed.ApiResponse === undefined) {
    const found = Object.keys(parsed).find((key) => key !== TEXT_NODE);
    throw new MalformedResponseError(
      found ? `expected root element ApiResponse, found ${found}` : 'document has no root element',
      '/'
    );
  }
  const root = toElement(parsed.ApiResponse, path);
  const status = requiredAttr(root, 'Status', path);

  if (status === 'ERROR') {
    const errors = readErrors(root, path);
    if (errors.length === 0) {
      throw new MalformedResponseError('Status="ERROR" without any Error element', `${path}/Errors`);
    }
    throw new NamecheapApiError(errors);
  }

  if (status !== 'OK') {
    throw new MalformedResponseError(`unknown Status "${status}"`, `${path}/@Status`);
  }

  if (readErrors(root, path).length > 0) {
    throw new MalformedResponseError('Status="OK" with a non-empty Errors element', `${path}/Errors`);
  }

  const command = childElement(root, 'CommandResponse', path);
  const metadata = readMetadata(root, path);

  return { command, metadata };
}
