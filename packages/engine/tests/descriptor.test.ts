import { describe, it, expect } from 'vitest';
import { create } from '@bufbuild/protobuf';
import { CodeGeneratorRequestSchema, FileDescriptorProtoSchema } from '@bufbuild/protobuf/wkt';
import {
  commentBodies,
  commentText,
  decodeFiles,
  decodeRequest,
  goImportPath,
  goPackageName,
} from '../src/descriptor/index.js';
import { isCacheManagerGenError } from '../src/errors.js';
import { moneyProto, orderProto, priceProto } from './fixtures.js';

describe('decodeFiles — order.proto', () => {
  const [file] = decodeFiles([orderProto()], ['shop/v1/order.proto']);

  it('decodes file-level fields', () => {
    expect(file?.name).toBe('shop/v1/order.proto');
    expect(file?.protoPackage).toBe('shop.v1');
    expect(file?.generate).toBe(true);
    expect(file?.filenamePrefix).toBe('shop/v1/order');
    expect(file?.goPackageName).toBe('shopv1');
    expect(file?.goImportPath).toBe('example.com/shop/v1');
  });

  it('keeps services and methods in declaration order', () => {
    expect(file?.services.map(s => s.name)).toEqual(['OrderCache', 'OrderService']);
    expect(file?.services[0]?.methods.map(m => m.name)).toEqual(['GetOrder', 'ListLines']);
  });

  it('attaches leading comments by source path', () => {
    const service = file?.services[0];
    expect(service?.leadingComment).toBe(' Caches order lookups.\n');
    expect(service?.methods[0]?.leadingComment).toBe(' GetOrder fetches one order.\n');
    expect(service?.methods[1]?.leadingComment).toBeUndefined();
  });

  it('treats an empty comment as absent', () => {
    expect(file?.services[1]?.leadingComment).toBeUndefined();
  });

  it('resolves input and output types', () => {
    const method = file?.services[0]?.methods[0];
    expect(method?.input).toEqual({
      fullName: 'shop.v1.OrderReq',
      localName: 'OrderReq',
      scopedName: 'OrderReq',
      file: 'shop/v1/order.proto',
    });
    expect(method?.output.localName).toBe('OrderResp');
    expect(method?.parent).toBe('OrderCache');
  });

  it('joins nested message names with an underscore', () => {
    const output = file?.services[0]?.methods[1]?.output;
    expect(output).toEqual({
      fullName: 'shop.v1.Order.Line',
      localName: 'Order_Line',
      scopedName: 'Order.Line',
      file: 'shop/v1/order.proto',
    });
  });

  it('flags files not listed for generation', () => {
    const [other] = decodeFiles([orderProto()], []);
    expect(other?.generate).toBe(false);
  });
});

describe('decodeRequest', () => {
  const request = create(CodeGeneratorRequestSchema, {
    fileToGenerate: ['billing/v1/price.proto'],
    protoFile: [moneyProto(), priceProto()],
  });

  it('decodes every proto file and flags the requested ones', () => {
    const files = decodeRequest(request);
    expect(files.map(f => [f.name, f.generate])).toEqual([
      ['common/v1/money.proto', false],
      ['billing/v1/price.proto', true],
    ]);
  });

  it('resolves types declared in imported files', () => {
    const price = decodeRequest(request)[1];
    expect(price?.services[0]?.methods[0]?.output).toEqual({
      fullName: 'common.v1.Money',
      localName: 'Money',
      scopedName: 'Money',
      file: 'common/v1/money.proto',
    });
  });

  it('fails on a type missing from the request', () => {
    expect(() => decodeFiles([priceProto()], ['billing/v1/price.proto'])).toThrowError(
      'Unknown message type .common.v1.Money referenced by PriceCache.GetPrice',
    );
  });

  it('reports the missing type as UNKNOWN_TYPE', () => {
    try {
      decodeFiles([priceProto()], ['billing/v1/price.proto']);
      expect.unreachable();
    } catch (err) {
      expect(isCacheManagerGenError(err) && err.code).toBe('UNKNOWN_TYPE');
    }
  });
});

describe('goPackageName', () => {
  const file = (init: { name?: string; package?: string; goPackage?: string }) =>
    create(FileDescriptorProtoSchema, {
      name: init.name ?? 'x/y.proto',
      package: init.package ?? '',
      ...(init.goPackage === undefined ? {} : { options: { goPackage: init.goPackage } }),
    });

  it('uses the name after ; in go_package', () => {
    expect(goPackageName(file({ goPackage: 'example.com/shop/v1;shopv1' }))).toBe('shopv1');
  });

  it('falls back to the last go_package path segment', () => {
    expect(goPackageName(file({ goPackage: 'example.com/shop/v1' }))).toBe('v1');
  });

  it('derives the name from the proto package', () => {
    expect(goPackageName(file({ package: 'shop.v1' }))).toBe('shop_v1');
  });

  it('derives the name from the file name as a last resort', () => {
    expect(goPackageName(file({ name: 'foo/bar-baz.proto' }))).toBe('bar_baz');
  });

  it('prefixes names starting with a digit', () => {
    expect(goPackageName(file({ goPackage: 'example.com/x;2fast' }))).toBe('_2fast');
  });

  it('prefers an explicit go_package value', () => {
    expect(goPackageName(file({ goPackage: 'example.com/shop/v1' }), 'example.com/mapped;mappedpb')).toBe('mappedpb');
  });
});

describe('goImportPath', () => {
  const file = (init: { name?: string; goPackage?: string }) =>
    create(FileDescriptorProtoSchema, {
      name: init.name ?? 'shop/v1/order.proto',
      ...(init.goPackage === undefined ? {} : { options: { goPackage: init.goPackage } }),
    });

  it('drops the package name after ;', () => {
    expect(goImportPath(file({ goPackage: 'example.com/shop/v1;shopv1' }))).toBe('example.com/shop/v1');
  });

  it('keeps a plain go_package', () => {
    expect(goImportPath(file({ goPackage: 'example.com/shop/v1' }))).toBe('example.com/shop/v1');
  });

  it('falls back to the directory of the .proto', () => {
    expect(goImportPath(file({}))).toBe('shop/v1');
    expect(goImportPath(file({ name: 'order.proto' }))).toBe('.');
  });
});

describe('decodeFiles — go_package overrides', () => {
  it('applies an import path mapped to the file name', () => {
    const [file] = decodeFiles([orderProto()], ['shop/v1/order.proto'], {
      'shop/v1/order.proto': 'example.com/gen/orders;orderspb',
    });
    expect(file?.goImportPath).toBe('example.com/gen/orders');
    expect(file?.goPackageName).toBe('orderspb');
  });

  it('uses go_package when no mapping names the file', () => {
    const [file] = decodeFiles([orderProto()], ['shop/v1/order.proto'], { 'other.proto': 'example.com/other' });
    expect(file?.goImportPath).toBe('example.com/shop/v1');
  });
});

describe('comment helpers', () => {
  it('splits a raw comment into bodies', () => {
    expect(commentBodies(' One.\n\n Three.\n')).toEqual([' One.', '', ' Three.']);
  });

  it('strips the marker space from each line', () => {
    expect(commentText(' One.\n\n Three.\n')).toBe('One.\n\nThree.');
  });

  it('keeps indentation beyond the marker space', () => {
    expect(commentText('   indented\n')).toBe('  indented');
  });
});
