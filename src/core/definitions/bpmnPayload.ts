import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

export const BPMN_NAMESPACE = "http://www.omg.org/spec/BPMN/20100524/MODEL";
export const UENGINE_NAMESPACE = "http://uengine";

export class BpmnPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BpmnPayloadError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const isElement = (node: Node): node is Element => node.nodeType === 1;

const parseDocument = (xml: string): Document => {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, msg: unknown) => {
      if (level !== "warning") problems.push(String(msg));
    }
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, "text/xml");
  } catch (err) {
    throw new BpmnPayloadError(err instanceof Error ? err.message : String(err));
  }
  if (problems.length > 0) throw new BpmnPayloadError(problems[0]);
  if (doc.documentElement === null) throw new BpmnPayloadError("payload has no root element");
  return doc;
};

const childElement = (parent: Element, namespace: string, localName: string): Element | null => {
  for (let i = 0; i < parent.childNodes.length; i += 1) {
    const node = parent.childNodes.item(i);
    if (isElement(node) && node.namespaceURI === namespace && node.localName === localName) return node;
  }
  return null;
};

const ensureChild = (parent: Element, namespace: string, localName: string, fallbackPrefix: string): Element => {
  const existing = childElement(parent, namespace, localName);
  if (existing) return existing;

  const prefix = parent.lookupPrefix(namespace) ?? fallbackPrefix;
  const created = parent.ownerDocument.createElementNS(namespace, prefix ? `${prefix}:${localName}` : localName);
  parent.appendChild(created);
  return created;
};

const replaceText = (element: Element, text: string) => {
  for (let child = element.firstChild; child !== null; child = element.firstChild) {
    element.removeChild(child);
  }
  element.appendChild(element.ownerDocument.createTextNode(text));
};

/**
 * Sets `extensionElements/uengine:properties/uengine:json` of each listed task element,
 * creating the missing wrappers. Returns the input untouched when no listed id occurs.
 */
export const writeActivityProperties = (
  xml: string,
  propertiesById: ReadonlyMap<string, Record<string, unknown>>,
  taskTypes: readonly string[]
): string => {
  const doc = parseDocument(xml);
  let written = 0;

  for (const taskType of taskTypes) {
    const tasks = doc.getElementsByTagNameNS(BPMN_NAMESPACE, taskType);
    for (let i = 0; i < tasks.length; i += 1) {
      const task = tasks.item(i);
      const properties = task ? propertiesById.get(task.getAttribute("id") ?? "") : undefined;
      if (!task || !properties) continue;

      const extensions = ensureChild(task, BPMN_NAMESPACE, "extensionElements", "bpmn");
      const holder = ensureChild(extensions, UENGINE_NAMESPACE, "properties", "uengine");
      replaceText(ensureChild(holder, UENGINE_NAMESPACE, "json", "uengine"), JSON.stringify(properties));
      written += 1;
    }
  }

  return written === 0 ? xml : new XMLSerializer().serializeToString(doc);
};
