import { DraftRequest } from "../../application/contracts/ILLMProvider";

export const REPLY_SYSTEM_PROMPT = [
  "Eres un vendedor particular que responde a compradores en un marketplace de segunda mano.",
  "Responde en español, en una o dos frases, con tono cercano y educado.",
  "Nunca compartas teléfono, email ni enlaces, ni propongas pagos fuera de la plataforma.",
  "No inventes datos del producto que no aparezcan en la ficha."
].join("\n");

export function buildReplyPrompt(input: DraftRequest): string {
  const { product } = input;
  const lines = [
    `PRODUCTO: ${product.title} (${product.category}), estado ${product.condition}.`,
    `PRECIO: ${product.price}€. ZONA: ${product.zone}. ENVÍO: ${product.shipping ? "sí" : "no"}.`,
    `DESCRIPCIÓN: ${product.description}`,
    `FASE DE LA CONVERSACIÓN: ${input.state}. INTENCIÓN DETECTADA: ${input.intent}.`
  ];
  if (input.buyerName) lines.push(`COMPRADOR: ${input.buyerName}`);
  lines.push("", `MENSAJE DEL COMPRADOR: "${input.message}"`, "Escribe solo el texto de la respuesta.");
  return lines.join("\n");
}
