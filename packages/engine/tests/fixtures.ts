import { create } from '@bufbuild/protobuf';
import { FileDescriptorProtoSchema, type FileDescriptorProto } from '@bufbuild/protobuf/wkt';
import type { FileDescriptor, MethodDescriptor, ServiceDescriptor, TypeRef } from '../src/types.js';
import { getDefaultConfig } from '../src/config/loader.js';
import type { GeneratorConfig } from '../src/types.js';

// ── Descriptor builders ───────────────────────────────────────

export function makeType(localName: string, file = 'shop/v1/order.proto'): TypeRef {
  const scopedName = localName.replace(/_/g, '.');
  return { fullName: `shop.v1.${scopedName}`, localName, scopedName, file };
}

export function makeMethod(
  name: string,
  input: string,
  output: string,
  overrides: Partial<MethodDescriptor> = {},
): MethodDescriptor {
  return {
    name,
    parent: 'OrderCache',
    input: makeType(input),
    output: makeType(output),
    clientStreaming: false,
    serverStreaming: false,
    ...overrides,
  };
}

export function makeService(
  name: string,
  methods: MethodDescriptor[] = [],
  overrides: Partial<ServiceDescriptor> = {},
): ServiceDescriptor {
  return { name, methods: methods.map(m => ({ ...m, parent: name })), ...overrides };
}

export function makeFile(services: ServiceDescriptor[], overrides: Partial<FileDescriptor> = {}): FileDescriptor {
  return {
    name: 'shop/v1/order.proto',
    protoPackage: 'shop.v1',
    generate: true,
    filenamePrefix: 'shop/v1/order',
    goPackageName: 'shopv1',
    goImportPath: 'example.com/shop/v1',
    services,
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
  return { ...getDefaultConfig(), ...overrides };
}

export const orderCache = (): ServiceDescriptor =>
  makeService('OrderCache', [makeMethod('GetOrder', 'OrderReq', 'OrderResp')]);

// ── Proto fixtures ────────────────────────────────────────────

/**
 * shop/v1/order.proto
 *
 *   // Caches order lookups.
 *   service OrderCache {
 *     // GetOrder fetches one order.
 *     rpc GetOrder(OrderReq) returns (OrderResp);
 *     rpc ListLines(OrderReq) returns (Order.Line);
 *   }
 *   service OrderService { rpc GetOrder(OrderReq) returns (OrderResp); }
 */
export function orderProto(): FileDescriptorProto {
  return create(FileDescriptorProtoSchema, {
    name: 'shop/v1/order.proto',
    package: 'shop.v1',
    syntax: 'proto3',
    options: { goPackage: 'example.com/shop/v1;shopv1' },
    messageType: [
      { name: 'OrderReq' },
      { name: 'OrderResp' },
      { name: 'Order', nestedType: [{ name: 'Line' }] },
    ],
    service: [
      {
        name: 'OrderCache',
        method: [
          { name: 'GetOrder', inputType: '.shop.v1.OrderReq', outputType: '.shop.v1.OrderResp' },
          { name: 'ListLines', inputType: '.shop.v1.OrderReq', outputType: '.shop.v1.Order.Line' },
        ],
      },
      {
        name: 'OrderService',
        method: [{ name: 'GetOrder', inputType: '.shop.v1.OrderReq', outputType: '.shop.v1.OrderResp' }],
      },
    ],
    sourceCodeInfo: {
      location: [
        { path: [6, 0], leadingComments: ' Caches order lookups.\n' },
        { path: [6, 0, 2, 0], leadingComments: ' GetOrder fetches one order.\n' },
        { path: [6, 1], leadingComments: '' },
      ],
    },
  });
}

/** common/v1/money.proto: a message-only file imported by other fixtures */
export function moneyProto(): FileDescriptorProto {
  return create(FileDescriptorProtoSchema, {
    name: 'common/v1/money.proto',
    package: 'common.v1',
    messageType: [{ name: 'Money' }],
  });
}

/** billing/v1/price.proto: PriceCache returns a message declared in money.proto */
export function priceProto(): FileDescriptorProto {
  return create(FileDescriptorProtoSchema, {
    name: 'billing/v1/price.proto',
    package: 'billing.v1',
    dependency: ['common/v1/money.proto'],
    messageType: [{ name: 'PriceReq' }],
    service: [
      {
        name: 'PriceCache',
        method: [{ name: 'GetPrice', inputType: '.billing.v1.PriceReq', outputType: '.common.v1.Money' }],
      },
    ],
  });
}
