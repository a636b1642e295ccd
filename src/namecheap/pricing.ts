/**
 * namecheap.users.getPricing response decoding and encoding
 *
 * The decoder is a pure function of the response text. It either returns the
 * full ProductType → ProductCategory → Product → Price hierarchy in document
 * order, or throws; a partially decoded result is never returned.
 */

import { XMLBuilder } from 'fast-xml-parser';
import { MalformedResponseError, NamecheapApiError } from './errors';
import {
  ATTRIBUTE_PREFIX,
  NAMESPACE,
  type XmlNode,
  childElement,
  childElements,
  decimalAttr,
  optionalDecimalAttr,
  positiveIntegerAttr,
  readEnvelope,
  requiredAttr,
} from './xml';
import type {
  ApiError,
  DecodeResult,
  PriceEntry,
  PricingResult,
  Product,
  ProductCategory,
  ProductTypeResult,
} from './types';

export const PRICING_COMMAND = 'namecheap.users.getPricing';

const RESULT_PATH = '/ApiResponse/CommandResponse/UserGetPricingResult';

function decodePrice(node: XmlNode, path: string): PriceEntry {
  const couponPrice = optionalDecimalAttr(node, 'CouponPrice', path);
  const additionalCost = optionalDecimalAttr(node, 'AdditionalCost', path);

  return {
    duration: positiveIntegerAttr(node, 'Duration', path),
    durationType: requiredAttr(node, 'DurationType', path),
    price: decimalAttr(node, 'Price', path),
    regularPrice: decimalAttr(node, 'RegularPrice', path),
    yourPrice: decimalAttr(node, 'YourPrice', path),
    ...(couponPrice !== undefined ? { couponPrice } : {}),
    ...(additionalCost !== undefined ? { additionalCost } : {}),
    currency: requiredAttr(node, 'Currency', path),
  };
}

function decodeProduct(node: XmlNode, path: string): Product {
  return {
    name: requiredAttr(node, 'Name', path),
    prices: childElements(node, 'Price', path).map((price, i) => decodePrice(price, `${path}/Price[${i}]`)),
  };
}

function decodeCategory(node: XmlNode, path: string): ProductCategory {
  return {
    name: requiredAttr(node, 'Name', path),
    products: childElements(node, 'Product', path).map((product, i) =>
      decodeProduct(product, `${path}/Product[${i}]`)
    ),
  };
}

function decodeProductType(node: XmlNode, path: string): ProductTypeResult {
  return {
    name: requiredAttr(node, 'Name', path),
    categories: childElements(node, 'ProductCategory', path).map((category, i) =>
      decodeCategory(category, `${path}/ProductCategory[${i}]`)
    ),
  };
}

/**
 * Decode a getPricing response document.
 *
 * @throws NamecheapApiError with every reported error when Status="ERROR"
 * @throws MalformedResponseError when the document does not have the documented shape
 */
export function decodePricing(document: string): PricingResult {
  const { command, metadata } = readEnvelope(document);
  const result = childElement(command, 'UserGetPricingResult', '/ApiResponse/CommandResponse');

  const productTypes = childElements(result, 'ProductType', RESULT_PATH).map((productType, i) =>
    decodeProductType(productType, `${RESULT_PATH}/ProductType[${i}]`)
  );

  return { productTypes, ...metadata };
}

/**
 * Like decodePricing, but reports failures as a value instead of throwing
 */
export function safeDecodePricing(document: string): DecodeResult<PricingResult> {
  try {
    return { success: true, data: decodePricing(document) };
  } catch (error) {
    if (error instanceof NamecheapApiError || error instanceof MalformedResponseError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Total number of Price entries across the whole hierarchy
 */
export function countPriceEntries(result: PricingResult): number {
  return result.productTypes.reduce(
    (total, productType) =>
      total +
      productType.categories.reduce(
        (sum, category) => sum + category.products.reduce((n, product) => n + product.prices.length, 0),
        0
      ),
    0
  );
}

/**
 * Look up the price list of a product, e.g. ("DOMAIN", "REGISTER", "com")
 */
export function findProduct(
  result: PricingResult,
  productType: string,
  category: string,
  productName: string
): Product | undefined {
  const name = productName.toLowerCase();
  return result.productTypes
    .find((t) => t.name.toUpperCase() === productType.toUpperCase())
    ?.categories.find((c) => c.name.toUpperCase() === category.toUpperCase())
    ?.products.find((p) => p.name.toLowerCase() === name);
}

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  format: true,
});

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>\n';

function encodePrice(entry: PriceEntry): Record<string, string> {
  return {
    '@_Duration': String(entry.duration),
    '@_DurationType': entry.durationType,
    '@_Price': entry.price,
    '@_RegularPrice': entry.regularPrice,
    '@_YourPrice': entry.yourPrice,
    '@_CouponPrice': entry.couponPrice ?? '',
    ...(entry.additionalCost !== undefined ? { '@_AdditionalCost': entry.additionalCost } : {}),
    '@_Currency': entry.currency,
  };
}

/**
 * Render a PricingResult as a Status="OK" getPricing response
 */
export function encodePricing(result: PricingResult): string {
  const response = {
    ApiResponse: {
      '@_Status': 'OK',
      '@_xmlns': NAMESPACE,
      Errors: '',
      RequestedCommand: PRICING_COMMAND,
      CommandResponse: {
        '@_Type': PRICING_COMMAND,
        UserGetPricingResult: {
          ProductType: result.productTypes.map((productType) => ({
            '@_Name': productType.name,
            ProductCategory: productType.categories.map((category) => ({
              '@_Name': category.name,
              Product: category.products.map((product) => ({
                '@_Name': product.name,
                Price: product.prices.map(encodePrice),
              })),
            })),
          })),
        },
      },
      Server: result.server,
      GMTTimeDifference: result.gmtTimeDifference,
      ExecutionTime: String(result.executionTimeSeconds),
    },
  };

  return XML_DECLARATION + xmlBuilder.build(response);
}

/**
 * Render a Status="ERROR" response carrying the given errors
 */
export function encodeErrors(errors: ReadonlyArray<ApiError>): string {
  const response = {
    ApiResponse: {
      '@_Status': 'ERROR',
      '@_xmlns': NAMESPACE,
      Errors: {
        Error: errors.map((error) => ({
          '@_Number': String(error.code),
          '#text': error.message,
        })),
      },
      RequestedCommand: PRICING_COMMAND,
    },
  };

  return XML_DECLARATION + xmlBuilder.build(response);
}
