import { describe, it, expect } from 'vitest';
import {
  cacheLogicalName,
  compositeFieldName,
  constructorName,
  getterName,
  goCamelCase,
  handleFieldName,
  managerName,
  privateFieldName,
  refresherName,
  updateFnName,
} from '../src/naming/index.js';

describe('managerName', () => {
  it('appends Manager', () => {
    expect(managerName('OrderCache')).toBe('OrderCacheManager');
    expect(managerName('Cache')).toBe('CacheManager');
  });

  it('maps the empty name to the empty name', () => {
    expect(managerName('')).toBe('');
  });

  it('is deterministic', () => {
    expect(managerName('UserCache')).toBe(managerName('UserCache'));
  });
});

describe('privateFieldName', () => {
  it('lower-cases only the first character', () => {
    expect(privateFieldName('OrderCacheManager')).toBe('orderCacheManager');
    expect(privateFieldName('URLCacheManager')).toBe('uRLCacheManager');
  });

  it('leaves an already lower-case name alone', () => {
    expect(privateFieldName('orderCacheManager')).toBe('orderCacheManager');
  });

  it('maps the empty name to the empty name', () => {
    expect(privateFieldName('')).toBe('');
  });

  it('handles a non-ASCII first character', () => {
    expect(privateFieldName('ÉtatCacheManager')).toBe('étatCacheManager');
  });
});

describe('derived member names', () => {
  it('joins field parts with an underscore', () => {
    expect(compositeFieldName('orderCacheManager', 'GetOrder')).toBe('orderCacheManager_GetOrder');
  });

  it('builds the handle field from service and method names', () => {
    expect(handleFieldName('OrderCache', 'GetOrder')).toBe('orderCacheManager_GetOrder');
  });

  it('names the constructor, update functions and wrappers', () => {
    expect(constructorName('OrderCacheManager')).toBe('NewOrderCacheManager');
    expect(updateFnName('GetOrder')).toBe('updateGetOrderFn');
    expect(getterName('GetOrder')).toBe('GetGetOrder');
    expect(refresherName('GetOrder')).toBe('RefreshGetOrder');
  });

  it('lower-cases the logical cache name', () => {
    expect(cacheLogicalName('GetOrder')).toBe('getorder');
  });
});

describe('goCamelCase', () => {
  it('leaves Go-style names alone', () => {
    expect(goCamelCase('GetOrder')).toBe('GetOrder');
    expect(goCamelCase('HTTPGet')).toBe('HTTPGet');
  });

  it('capitalises words split by underscores', () => {
    expect(goCamelCase('get_order')).toBe('GetOrder');
    expect(goCamelCase('order_req')).toBe('OrderReq');
    expect(goCamelCase('order_cache')).toBe('OrderCache');
  });

  it('keeps an underscore before a non-lowercase character', () => {
    expect(goCamelCase('order_V2')).toBe('Order_V2');
    expect(goCamelCase('get_2x')).toBe('Get_2X');
  });

  it('turns a leading underscore into X', () => {
    expect(goCamelCase('_id')).toBe('XId');
  });

  it('joins nested message names with an underscore', () => {
    expect(goCamelCase('Order.Line')).toBe('Order_Line');
    expect(goCamelCase('order.line_item')).toBe('OrderLineItem');
  });
});
