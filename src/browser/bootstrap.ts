/**
 * bootstrap.ts — Script-side reflector layer
 *
 * Evaluated once per page, after `__host` is installed and before any page
 * script. It gives page scripts a small DOM-shaped surface built on integer
 * handles:
 *
 *   document.querySelectorAll(sel)   document.createElement(tag)
 *   node.getAttribute(name)          node.setAttribute(name, value)
 *   node.innerHTML = html            node.children
 *   node.appendChild(child)          node.insertBefore(child, ref)
 *   node.addEventListener(type, fn)  event.preventDefault()
 *   console.log(...args)
 *
 * A Node is just `{ handle }`; two Nodes for the same element are different
 * objects. Only this program makes Nodes: `new Node()` throws, `handle` is
 * read-only, and `__host` is removed from the global scope once captured, so
 * page scripts cannot present a handle the host never gave out. Listeners
 * live in LISTENERS[handle][type] and are never removed, even when the
 * element leaves the document.
 *
 * `__dispatchEvent(handle, type)` is the host's way back in. It returns the
 * event's allow-default flag. Listener exceptions are not caught here.
 */

export const BOOTSTRAP_FILENAME = '<bootstrap>';

export const BOOTSTRAP_JS = `
(function (global) {
  'use strict';
  if (typeof global.__dispatchEvent === 'function') return;

  var host = global.__host;
  delete global.__host;
  var LISTENERS = Object.create(null);
  var REFLECTORS = new WeakSet();

  function Node() {
    throw new TypeError('Illegal constructor');
  }

  function reflect(handle) {
    var node = Object.create(Node.prototype);
    Object.defineProperty(node, 'handle', { value: handle, enumerable: true });
    REFLECTORS.add(node);
    return node;
  }

  function wrap(handles) {
    var out = [];
    for (var i = 0; i < handles.length; i++) out.push(reflect(handles[i]));
    return out;
  }

  function handleOf(node) {
    if (!REFLECTORS.has(node)) throw new TypeError('argument is not a Node');
    return node.handle;
  }

  Node.prototype.getAttribute = function (name) {
    return host.getAttribute(handleOf(this), String(name));
  };

  Node.prototype.setAttribute = function (name, value) {
    host.setAttribute(handleOf(this), String(name), String(value));
  };

  Node.prototype.appendChild = function (child) {
    host.appendChild(handleOf(this), handleOf(child));
    return child;
  };

  Node.prototype.insertBefore = function (child, reference) {
    host.insertBefore(handleOf(this), handleOf(child), reference == null ? null : handleOf(reference));
    return child;
  };

  Node.prototype.addEventListener = function (type, listener) {
    var handle = handleOf(this);
    if (typeof listener !== 'function') return;
    type = String(type);
    var byType = LISTENERS[handle];
    if (!byType) byType = LISTENERS[handle] = Object.create(null);
    var list = byType[type];
    if (!list) list = byType[type] = [];
    list.push(listener);
  };

  Object.defineProperty(Node.prototype, 'innerHTML', {
    set: function (html) { host.setInnerHTML(handleOf(this), String(html)); },
    configurable: true,
  });

  Object.defineProperty(Node.prototype, 'children', {
    get: function () { return wrap(host.children(handleOf(this))); },
    configurable: true,
  });

  function Event(type, target) {
    this.type = type;
    this.target = target;
    this.defaultAllowed = true;
  }

  Event.prototype.preventDefault = function () {
    this.defaultAllowed = false;
  };

  Object.defineProperty(Event.prototype, 'defaultPrevented', {
    get: function () { return !this.defaultAllowed; },
    configurable: true,
  });

  function dispatchEvent(handle, type) {
    var event = new Event(type, reflect(handle));
    var byType = LISTENERS[handle];
    var list = byType && byType[type] ? byType[type].slice() : [];
    for (var i = 0; i < list.length; i++) {
      list[i].call(reflect(handle), event);
    }
    return event.defaultAllowed;
  }

  global.Node = Node;
  global.Event = Event;
  global.document = {
    querySelectorAll: function (selector) {
      return wrap(host.querySelectorAll(String(selector)));
    },
    createElement: function (tag) {
      return reflect(host.createElement(String(tag)));
    },
  };
  global.console = {
    log: function () {
      var parts = [];
      for (var i = 0; i < arguments.length; i++) parts.push(String(arguments[i]));
      host.log(parts.join(' '));
    },
  };

  Object.defineProperty(global, '__dispatchEvent', {
    value: dispatchEvent, writable: false, configurable: false, enumerable: false,
  });
})(globalThis);
`;
