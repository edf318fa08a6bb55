/** First character upper-cased, the rest lower-cased ("bitcoin-CASH" -> "Bitcoin-cash") */
export const capitalize = (value: string): string =>
  value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
